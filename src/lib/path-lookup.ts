import fs from 'fs';
import path from 'path';

function isExecutableFile(candidate: string): boolean {
  try {
    if (!fs.statSync(candidate).isFile()) return false;
    fs.accessSync(candidate, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** `command -v` without a shell: true when `name` is an executable file on PATH. */
export function commandExists(name: string, envPath: string = process.env.PATH || ''): boolean {
  if (!name || name.includes('/')) return false;
  return envPath
    .split(path.delimiter)
    .filter(Boolean)
    .some((dir) => isExecutableFile(path.join(dir, name)));
}
