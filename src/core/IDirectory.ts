import type { DirectoryEntry } from "./types.js";

export interface ListOptions {
	/** Stop collecting once this many entries have been found. */
	limit?: number;
}

export interface IDirectory {
	/** Returns the value stored at exactly `path`, or `undefined` when there is none. */
	get(path: string): Promise<string | undefined>;

	/** Returns the entries stored anywhere below `prefix`. */
	listUnder(prefix: string, options?: ListOptions): Promise<DirectoryEntry[]>;
}
