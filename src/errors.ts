export class OrganizerError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Bad command-line input: missing, unreadable or unwritable directories. */
export class ValidationError extends OrganizerError {}

export interface DuplicateName {
    filename: string;
    paths: string[];
}

function describeDuplicates(duplicates: DuplicateName[]): string {
    const lines = ['Duplicate filenames found in source directory:'];
    for (const duplicate of duplicates) {
        lines.push(`  ${duplicate.filename}`);
        for (const p of duplicate.paths) {
            lines.push(`    ${p}`);
        }
    }
    return lines.join('\n');
}

export class DuplicateFilenameError extends OrganizerError {
    constructor(readonly duplicates: DuplicateName[]) {
        super(describeDuplicates(duplicates));
    }
}

export class AmbiguousDateFolderError extends OrganizerError {
    constructor(readonly date: string, readonly candidates: string[]) {
        super([
            `Multiple folders match date ${date}:`,
            ...candidates.map(c => `  ${c}`),
            'Rename or merge them so only one remains.',
        ].join('\n'));
    }
}
