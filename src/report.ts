import { formatSize } from './format';
import type { Transfer, TransferPlan } from './organizer';

export interface RunMode {
    approve: boolean;
    move: boolean;
}

const VERBS = {
    copy: { base: 'copy', progressive: 'Copying', past: 'Copied' },
    move: { base: 'move', progressive: 'Moving', past: 'Moved' },
};

function verbsFor(mode: RunMode) {
    return mode.move ? VERBS.move : VERBS.copy;
}

export function summaryLines(plan: TransferPlan, mode: RunMode): string[] {
    const verbs = verbsFor(mode);
    const count = `${plan.transfers.length} files (${formatSize(plan.totalBytes)})`;
    const lines = [
        mode.approve
            ? `${verbs.progressive} ${count}`
            : `[DRY RUN] Would ${verbs.base} ${count}`,
    ];

    if (plan.skipped.length > 0) {
        lines.push(`Skipping ${plan.skipped.length} files (already exist with same size)`);
    }
    lines.push('');
    return lines;
}

export function transferLine(transfer: Transfer, mode: RunMode): string {
    const verbs = verbsFor(mode);
    const label = mode.approve ? verbs.past : `Would ${verbs.base}`;
    return `${label}: ${transfer.source} -> ${transfer.destination}`;
}

export function closingLines(plan: TransferPlan, mode: RunMode): string[] {
    if (mode.approve || plan.transfers.length === 0) {
        return [];
    }
    return ['', `Run with --approve to ${verbsFor(mode).base} files.`];
}
