import path from 'path';
import { comparePaths, type DirEntry, type FileSystem } from './filesystem';

export type FolderMatchResult =
    | { kind: 'none'; path: string }
    | { kind: 'single'; path: string }
    | { kind: 'multiple'; paths: string[] };

/** `2024-01-15`, `2024-01-15 Trip` and `2024-01-15-trip` all belong to 2024-01-15. */
export function isFolderForDate(name: string, date: string): boolean {
    if (!name.startsWith(date)) return false;
    const rest = name.slice(date.length);
    return rest === '' || rest.startsWith(' ') || rest.startsWith('-');
}

export function matchDateFolder(root: string, date: string, children: DirEntry[]): FolderMatchResult {
    const matches = children
        .filter(entry => entry.kind === 'directory' && isFolderForDate(entry.name, date))
        .map(entry => entry.path)
        .sort(comparePaths);

    if (matches.length === 0) {
        return { kind: 'none', path: path.join(root, date) };
    }
    if (matches.length === 1) {
        return { kind: 'single', path: matches[0] };
    }
    return { kind: 'multiple', paths: matches };
}

export async function findDateFolder(fileSystem: FileSystem, root: string, date: string): Promise<FolderMatchResult> {
    const rootStat = await fileSystem.stat(root);
    const children = rootStat?.isDirectory ? await fileSystem.listChildren(root) : [];
    return matchDateFolder(root, date, children);
}
