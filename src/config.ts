export const CONFIG = {
    // Camera output, compared lower-cased
    MANAGED_EXTENSIONS: ['.insv', '.insp', '.lrv'],
    // Written by the camera next to the footage, compared exactly
    MANAGED_FILENAMES: ['fileinfo_list.list'],
    // VID_20241011_185020_00_003.insv -> 2024-10-11
    FILENAME_DATE_PREFIXES: ['VID', 'LRV', 'IMG'],
    CANONICAL_SUBFOLDER: 'insta360',
    // YYYY-MM-DD, optionally followed by " label" or "-label"
    DATE_FOLDER_PATTERN: /^\d{4}-\d{2}-\d{2}([ -].*)?$/,
    LOG_LEVEL: process.env.LOG_LEVEL || 'info',
} as const;

export interface ClassifierConfig {
    readonly extensions: ReadonlySet<string>;
    readonly filenames: ReadonlySet<string>;
}

export function createClassifierConfig(overrides: {
    extensions?: Iterable<string>;
    filenames?: Iterable<string>;
} = {}): ClassifierConfig {
    const extensions = [...(overrides.extensions ?? CONFIG.MANAGED_EXTENSIONS)].map(ext => ext.toLowerCase());
    return Object.freeze({
        extensions: new Set(extensions),
        filenames: new Set(overrides.filenames ?? CONFIG.MANAGED_FILENAMES),
    });
}

/**
 * Directory names a tool does not descend into. The scanner enters
 * everything; the organizer skips MISC at any depth.
 */
export interface TraversalPolicy {
    readonly name: string;
    readonly excludedDirectories: ReadonlySet<string>;
}

export const SCANNER_POLICY: TraversalPolicy = Object.freeze({
    name: 'scanner',
    excludedDirectories: new Set<string>(),
});

export const ORGANIZER_POLICY: TraversalPolicy = Object.freeze({
    name: 'organizer',
    excludedDirectories: new Set(['MISC']),
});
