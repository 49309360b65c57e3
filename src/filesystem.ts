import fs from 'fs-extra';
import path from 'path';
import type { TraversalPolicy } from './config';

export type EntryKind = 'file' | 'directory' | 'other';

export interface DirEntry {
    name: string;
    path: string;
    kind: EntryKind;
    // Set for symlinks; `kind` describes what the link points at
    symlink?: boolean;
}

export interface FileStat {
    size: number;
    isDirectory: boolean;
    mtime: Date;
    birthtime?: Date;
    // Equal for two paths that point at the same underlying file
    identity: string;
}

/** Read-only view of a directory tree. */
export interface FileSystem {
    listChildren(dir: string): Promise<DirEntry[]>;
    /** Follows symlinks. Null when nothing exists at `target`. */
    stat(target: string): Promise<FileStat | null>;
}

export class NodeFileSystem implements FileSystem {
    async listChildren(dir: string): Promise<DirEntry[]> {
        const dirents = await fs.readdir(dir, { withFileTypes: true });
        const entries: DirEntry[] = [];

        for (const dirent of dirents) {
            const entryPath = path.join(dir, dirent.name);
            let kind: EntryKind = 'other';

            if (dirent.isDirectory()) {
                kind = 'directory';
            } else if (dirent.isFile()) {
                kind = 'file';
            } else if (dirent.isSymbolicLink()) {
                if (await fs.pathExists(entryPath)) {
                    const target = await fs.stat(entryPath);
                    kind = target.isDirectory() ? 'directory' : target.isFile() ? 'file' : 'other';
                }
                entries.push({ name: dirent.name, path: entryPath, kind, symlink: true });
                continue;
            }

            entries.push({ name: dirent.name, path: entryPath, kind });
        }

        return entries.sort(byPath);
    }

    async stat(target: string): Promise<FileStat | null> {
        if (!await fs.pathExists(target)) {
            return null;
        }
        const stat = await fs.stat(target);
        return {
            size: stat.size,
            isDirectory: stat.isDirectory(),
            mtime: stat.mtime,
            // Zero when the platform does not record creation time
            birthtime: stat.birthtimeMs > 0 ? stat.birthtime : undefined,
            identity: `${stat.dev}:${stat.ino}`,
        };
    }
}

export function comparePaths(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function byPath(a: { path: string }, b: { path: string }): number {
    return comparePaths(a.path, b.path);
}

/**
 * Every file below `root`, sorted by path. Linked directories are not
 * entered, nor are directories whose name appears in the policy's exclusion
 * set, at any depth.
 */
export async function walkFiles(fileSystem: FileSystem, root: string, policy: TraversalPolicy): Promise<DirEntry[]> {
    const files: DirEntry[] = [];

    const visit = async (dir: string): Promise<void> => {
        for (const entry of await fileSystem.listChildren(dir)) {
            if (entry.kind === 'directory') {
                if (!entry.symlink && !policy.excludedDirectories.has(entry.name)) {
                    await visit(entry.path);
                }
            } else if (entry.kind === 'file') {
                files.push(entry);
            }
        }
    };

    await visit(root);
    return files.sort(byPath);
}
