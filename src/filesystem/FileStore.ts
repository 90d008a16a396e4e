/**
 * FileStore — Filesystem Capability
 *
 * The only place the package touches the disk. Everything above it works
 * through this interface, so tests can hand in an in-memory store and
 * count reads.
 *
 * @module
 */
import { existsSync, readFileSync, readdirSync, statSync, type Stats } from 'node:fs';
import { join } from 'node:path';
import { IconReadError } from '../errors.js';

// ── Contract ─────────────────────────────────────────────

export interface FileStore {
    /** Whether a regular file exists at `path` */
    exists(path: string): boolean;
    /**
     * Raw UTF-8 contents of `path`.
     * @throws {IconReadError} when the file cannot be read
     */
    read(path: string): string;
    /**
     * Every regular file below `directory`, recursively, relative to it
     * with `/` separators and sorted. A missing directory yields `[]`.
     */
    list(directory: string): string[];
}

// ── Node Implementation ──────────────────────────────────

export class NodeFileStore implements FileStore {
    exists(path: string): boolean {
        if (!existsSync(path)) return false;
        return statSync(path).isFile();
    }

    read(path: string): string {
        try {
            return readFileSync(path, 'utf-8');
        } catch (err) {
            throw new IconReadError(path, err);
        }
    }

    list(directory: string): string[] {
        if (!existsSync(directory) || !statSync(directory).isDirectory()) return [];

        const files: string[] = [];
        walk(directory, '', files);
        return files.sort();
    }
}

/** Stats of a symlink's target, or `undefined` for a dangling link */
function followLink(path: string): Stats | undefined {
    return statSync(path, { throwIfNoEntry: false });
}

function walk(root: string, relative: string, out: string[]): void {
    const entries = readdirSync(join(root, relative), { withFileTypes: true });
    for (const entry of entries) {
        const child = relative ? `${relative}/${entry.name}` : entry.name;
        // Dirent type checks describe the link itself, not its target
        const target = entry.isSymbolicLink() ? followLink(join(root, child)) : entry;
        if (target?.isDirectory()) {
            walk(root, child, out);
        } else if (target?.isFile()) {
            out.push(child);
        }
    }
}
