import fs from 'fs';
import path from 'path';
import { IOError } from '../utils/errors';

export function fileExists(file: string): boolean {
  return fs.existsSync(file);
}

export function readText(file: string): string {
  try {
    return fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw new IOError(`Cannot read ${file}`, file, e);
  }
}

/** Replaces the file, creating parent directories as needed. */
export function writeText(file: string, text: string): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, text, 'utf8');
  } catch (e) {
    throw new IOError(`Cannot write ${file}`, file, e);
  }
}

export function appendText(file: string, text: string): void {
  try {
    fs.appendFileSync(file, text, 'utf8');
  } catch (e) {
    throw new IOError(`Cannot append to ${file}`, file, e);
  }
}
