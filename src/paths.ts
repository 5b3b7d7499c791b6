import path from 'node:path';

export function filesRoot(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env.FILES_ROOT || '.');
}

// Download directories are taken relative to FILES_ROOT unless absolute
export function resolveDownloadDir(dir: string, root: string = filesRoot()): string {
  return path.resolve(root, dir);
}

// "machine learning" -> "machine-learning"
export function defaultDirectory(topic: string): string {
  return topic.replace(/ /g, '-');
}

export function partPath(dir: string, filename: string): string {
  return path.join(dir, `.${filename}.part`);
}
