/**
 * Synchronous file system port used by the event log backends and the loader.
 * The Node implementation is the default; tests swap in wrappers to provoke failures.
 */

import { randomBytes } from "node:crypto";
import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { IOError } from "../errors.js";

export interface SessionFs {
	readFile(path: string): string;
	writeFile(path: string, content: string): void;
	rename(from: string, to: string): void;
	remove(path: string): void;
	mkdir(path: string): void;
	exists(path: string): boolean;
	isDirectory(path: string): boolean;
	readdir(path: string): string[];
}

export const nodeSessionFs: SessionFs = {
	readFile: (path) => readFileSync(path, "utf-8"),
	writeFile: (path, content) => writeFileSync(path, content, "utf-8"),
	rename: (from, to) => renameSync(from, to),
	remove: (path) => rmSync(path, { force: true }),
	mkdir: (path) => {
		mkdirSync(path, { recursive: true });
	},
	exists: (path) => existsSync(path),
	isDirectory: (path) => existsSync(path) && statSync(path).isDirectory(),
	readdir: (path) => readdirSync(path).sort(),
};

/**
 * Replace `path` with `content` through a temporary sibling and a rename,
 * so readers see either the old document or the new one.
 */
export function writeFileAtomic(fs: SessionFs, path: string, content: string): void {
	const tmp = join(dirname(path), `.${basename(path)}.${randomBytes(4).toString("hex")}.tmp`);
	try {
		fs.writeFile(tmp, content);
		fs.rename(tmp, path);
	} catch (error) {
		fs.remove(tmp);
		throw new IOError("write", path, error);
	}
}

export function readFileOrThrow(fs: SessionFs, path: string): string {
	try {
		return fs.readFile(path);
	} catch (error) {
		throw new IOError("read", path, error);
	}
}
