import path from 'path';
import { CONFIG, SCANNER_POLICY } from './config';
import type { Classifier } from './classifier';
import { comparePaths, walkFiles, type FileSystem } from './filesystem';
import { shellQuote } from './format';

export interface Relocation {
    source: string;
    destination: string;
}

export interface RelocationPlan {
    sourceRoot: string;
    // Managed files found anywhere below the root, compliant or not
    managedCount: number;
    directories: string[];
    moves: Relocation[];
    // Top-level directories that are not date folders; reported, never touched
    nonDateFolders: string[];
}

export function isDateFolderName(name: string): boolean {
    return CONFIG.DATE_FOLDER_PATTERN.test(name);
}

/**
 * The date folder a file lives in, decided by its first segment below the
 * root only. Files sitting directly in the root have none.
 */
export function dateFolderOf(filePath: string, sourceRoot: string): string | null {
    const segments = path.relative(sourceRoot, filePath).split(path.sep);
    if (segments.length < 2 || !isDateFolderName(segments[0])) {
        return null;
    }
    return path.join(sourceRoot, segments[0]);
}

export function isCompliant(filePath: string, dateFolder: string): boolean {
    return path.dirname(filePath) === path.join(dateFolder, CONFIG.CANONICAL_SUBFOLDER);
}

export async function planFixes(fileSystem: FileSystem, classifier: Classifier, sourceRoot: string): Promise<RelocationPlan> {
    const files = (await walkFiles(fileSystem, sourceRoot, SCANNER_POLICY))
        .filter(entry => classifier.isManaged(entry.path));

    const directories = new Set<string>();
    const moves: Relocation[] = [];

    for (const file of files) {
        const dateFolder = dateFolderOf(file.path, sourceRoot);
        if (dateFolder === null || isCompliant(file.path, dateFolder)) {
            continue;
        }

        const targetDir = path.join(dateFolder, CONFIG.CANONICAL_SUBFOLDER);
        directories.add(targetDir);
        moves.push({ source: file.path, destination: path.join(targetDir, file.name) });
    }

    const nonDateFolders = (await fileSystem.listChildren(sourceRoot))
        .filter(entry => entry.kind === 'directory' && !isDateFolderName(entry.name))
        .map(entry => entry.name)
        .sort(comparePaths);

    return {
        sourceRoot,
        managedCount: files.length,
        directories: [...directories].sort(comparePaths),
        moves: moves.sort((a, b) => comparePaths(a.source, b.source)),
        nonDateFolders,
    };
}

/** The plan as a bash script, one line per element. */
export function renderScript(plan: RelocationPlan): string[] {
    return [
        '#!/usr/bin/env bash',
        'set -x',
        ...plan.directories.map(dir => `mkdir -p ${shellQuote(dir)}`),
        '',
        ...plan.moves.map(move => `mv ${shellQuote(move.source)} ${shellQuote(move.destination)}`),
        '',
        `# ${plan.moves.length} files to move`,
    ];
}
