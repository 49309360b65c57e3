import { Classifier } from '../classifier';
import { createClassifierConfig } from '../config';
import { OrganizerError, ValidationError } from '../errors';
import { NodeFileSystem } from '../filesystem';
import { Organizer, type TransferPlan } from '../organizer';
import { closingLines, summaryLines, transferLine, type RunMode } from '../report';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, type CommandIO } from './io';
import { createProgram, parseArguments } from './program';
import { requireDirectory } from './validate';

export async function runOrganize(argv: string[], io: CommandIO): Promise<number> {
    const program = createProgram(io)
        .name('insta-organize')
        .description('Organize Insta360 files into date-based folders: <destination>/YYYY-MM-DD/insta360/<filename>')
        .argument('<source>', 'directory containing Insta360 files to organize')
        .argument('<destination>', 'directory holding the date folders')
        .option('--approve', 'actually copy or move files; without it only shows what would be done', false)
        .option('--move', 'move files instead of copying them', false);

    const handled = parseArguments(program, argv);
    if (handled !== null) return handled;

    const options = program.opts<{ approve: boolean; move: boolean }>();
    const mode: RunMode = { approve: options.approve, move: options.move };
    const [sourceArg, destinationArg] = program.args;

    let sourceRoot: string;
    let destinationRoot: string;
    try {
        sourceRoot = await requireDirectory('Source', sourceArg, 'read');
        destinationRoot = await requireDirectory('Destination', destinationArg, 'write');
    } catch (err) {
        if (err instanceof ValidationError) {
            io.logger.error(err.message);
            return EXIT_USAGE;
        }
        throw err;
    }

    const organizer = new Organizer(new NodeFileSystem(), new Classifier(createClassifierConfig()), io.logger);

    let plan: TransferPlan;
    try {
        plan = await organizer.plan(sourceRoot, destinationRoot);
    } catch (err) {
        if (err instanceof OrganizerError) {
            io.logger.error(err.message);
            return EXIT_FAILURE;
        }
        throw err;
    }

    if (plan.candidates.length === 0) {
        io.stdout('No Insta360 files found in source directory.');
        return EXIT_OK;
    }

    summaryLines(plan, mode).forEach(line => io.stdout(line));

    if (mode.approve) {
        await organizer.apply(plan, {
            move: mode.move,
            onTransfer: transfer => io.stdout(transferLine(transfer, mode)),
        });
    } else {
        for (const transfer of plan.transfers) {
            io.stdout(transferLine(transfer, mode));
        }
    }

    closingLines(plan, mode).forEach(line => io.stdout(line));
    return EXIT_OK;
}
