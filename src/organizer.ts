import fs from 'fs-extra';
import path from 'path';
import type { Logger } from './logger';
import { CONFIG, ORGANIZER_POLICY } from './config';
import type { Classifier } from './classifier';
import { formatDate, resolveDate } from './dates';
import { AmbiguousDateFolderError, DuplicateFilenameError, type DuplicateName } from './errors';
import { comparePaths, walkFiles, type FileStat, type FileSystem } from './filesystem';
import { findDateFolder } from './folder-matcher';

export interface ManagedFile {
    path: string;
    name: string;
    extension: string;
    size: number;
    stat: FileStat;
}

export interface Transfer {
    source: string;
    destination: string;
    date: string;
    size: number;
}

export interface TransferPlan {
    sourceRoot: string;
    destinationRoot: string;
    candidates: ManagedFile[];
    transfers: Transfer[];
    skipped: ManagedFile[];
    totalBytes: number;
}

export interface ApplyOptions {
    move: boolean;
    onTransfer?: (transfer: Transfer) => void;
}

export async function collectCandidates(fileSystem: FileSystem, classifier: Classifier, sourceRoot: string): Promise<ManagedFile[]> {
    const candidates: ManagedFile[] = [];

    for (const entry of await walkFiles(fileSystem, sourceRoot, ORGANIZER_POLICY)) {
        if (!classifier.isManaged(entry.path)) continue;

        const stat = await fileSystem.stat(entry.path);
        if (!stat) {
            throw new Error(`File disappeared while scanning: ${entry.path}`);
        }
        candidates.push({
            path: entry.path,
            name: entry.name,
            extension: path.extname(entry.name).toLowerCase(),
            size: stat.size,
            stat,
        });
    }

    return candidates;
}

/** Filenames (extension included) that occur at more than one source path. */
export function findDuplicateNames(files: Pick<ManagedFile, 'name' | 'path'>[]): DuplicateName[] {
    const byName = new Map<string, Set<string>>();
    for (const file of files) {
        const paths = byName.get(file.name) ?? new Set<string>();
        paths.add(file.path);
        byName.set(file.name, paths);
    }

    return [...byName.entries()]
        .filter(([, paths]) => paths.size > 1)
        .map(([filename, paths]) => ({ filename, paths: [...paths].sort(comparePaths) }))
        .sort((a, b) => comparePaths(a.filename, b.filename));
}

export class Organizer {
    constructor(
        private readonly fileSystem: FileSystem,
        private readonly classifier: Classifier,
        private readonly logger?: Logger,
    ) {}

    /**
     * Decide, for every managed file under `sourceRoot`, whether it needs to
     * go to `destinationRoot`. Nothing is written; duplicate names and
     * ambiguous date folders are thrown before any transfer can happen.
     */
    async plan(sourceRoot: string, destinationRoot: string): Promise<TransferPlan> {
        const candidates = await collectCandidates(this.fileSystem, this.classifier, sourceRoot);
        this.logger?.debug(`Found ${candidates.length} managed files in ${sourceRoot}`);

        const duplicates = findDuplicateNames(candidates);
        if (duplicates.length > 0) {
            throw new DuplicateFilenameError(duplicates);
        }

        // One lookup per date, so files of a not-yet-created day share a folder
        const folders = new Map<string, string>();
        const transfers: Transfer[] = [];
        const skipped: ManagedFile[] = [];
        let totalBytes = 0;

        for (const file of candidates) {
            const date = formatDate(resolveDate(file.name, file.stat));

            let folder = folders.get(date);
            if (folder === undefined) {
                folder = await this.resolveFolder(destinationRoot, date);
                folders.set(date, folder);
            }

            const destination = path.join(folder, CONFIG.CANONICAL_SUBFOLDER, file.name);
            if (await this.isUpToDate(file, destination)) {
                skipped.push(file);
                continue;
            }

            transfers.push({ source: file.path, destination, date, size: file.size });
            totalBytes += file.size;
        }

        return { sourceRoot, destinationRoot, candidates, transfers, skipped, totalBytes };
    }

    async apply(plan: TransferPlan, options: ApplyOptions): Promise<void> {
        for (const transfer of plan.transfers) {
            await fs.ensureDir(path.dirname(transfer.destination));

            if (options.move) {
                await fs.move(transfer.source, transfer.destination, { overwrite: true });
            } else {
                await fs.copy(transfer.source, transfer.destination, { overwrite: true, preserveTimestamps: true });
            }

            this.logger?.debug(`${options.move ? 'Moved' : 'Copied'} ${transfer.source} -> ${transfer.destination}`);
            options.onTransfer?.(transfer);
        }
    }

    private async resolveFolder(destinationRoot: string, date: string): Promise<string> {
        const match = await findDateFolder(this.fileSystem, destinationRoot, date);
        switch (match.kind) {
            case 'none':
            case 'single':
                return match.path;
            case 'multiple':
                throw new AmbiguousDateFolderError(date, match.paths);
        }
    }

    private async isUpToDate(file: ManagedFile, destination: string): Promise<boolean> {
        const existing = await this.fileSystem.stat(destination);
        if (!existing) {
            return false;
        }
        // Same inode: the source is already where it should be
        if (existing.identity === file.stat.identity) {
            return true;
        }
        return existing.size === file.size;
    }
}
