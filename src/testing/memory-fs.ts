import path from 'path';
import { byPath, type DirEntry, type FileStat, type FileSystem } from '../filesystem';

interface MemoryFile {
    size: number;
    mtime: Date;
    birthtime?: Date;
    // Paths sharing an identity behave like hard links / symlinks to one file
    identity: string;
}

/** In-memory tree for tests; parent directories are created implicitly. */
export class MemoryFileSystem implements FileSystem {
    private readonly files = new Map<string, MemoryFile>();
    private readonly directories = new Set<string>();

    addFile(filePath: string, attrs: Partial<MemoryFile> = {}): this {
        this.addParents(filePath);
        this.files.set(filePath, {
            size: attrs.size ?? 0,
            mtime: attrs.mtime ?? new Date(2024, 0, 1, 12),
            birthtime: attrs.birthtime,
            identity: attrs.identity ?? filePath,
        });
        return this;
    }

    addDirectory(dir: string): this {
        this.addParents(dir);
        this.directories.add(dir);
        return this;
    }

    async listChildren(dir: string): Promise<DirEntry[]> {
        const entries: DirEntry[] = [];
        for (const d of this.directories) {
            if (d !== dir && path.dirname(d) === dir) {
                entries.push({ name: path.basename(d), path: d, kind: 'directory' });
            }
        }
        for (const f of this.files.keys()) {
            if (path.dirname(f) === dir) {
                entries.push({ name: path.basename(f), path: f, kind: 'file' });
            }
        }
        return entries.sort(byPath);
    }

    async stat(target: string): Promise<FileStat | null> {
        const file = this.files.get(target);
        if (file) {
            return { ...file, isDirectory: false };
        }
        if (this.directories.has(target)) {
            return { size: 0, isDirectory: true, mtime: new Date(0), identity: target };
        }
        return null;
    }

    private addParents(target: string): void {
        let current = path.dirname(target);
        while (current !== path.dirname(current)) {
            this.directories.add(current);
            current = path.dirname(current);
        }
        this.directories.add(current);
    }
}
