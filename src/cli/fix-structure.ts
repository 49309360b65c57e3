import { Classifier } from '../classifier';
import { createClassifierConfig } from '../config';
import { ValidationError } from '../errors';
import { NodeFileSystem } from '../filesystem';
import { planFixes, renderScript } from '../scanner';
import { EXIT_OK, EXIT_USAGE, type CommandIO } from './io';
import { createProgram, parseArguments } from './program';
import { requireDirectory } from './validate';

export async function runFixStructure(argv: string[], io: CommandIO): Promise<number> {
    const program = createProgram(io)
        .name('insta-fix-structure')
        .description('Print shell commands that move Insta360 files into the insta360/ subfolder of their date folder')
        .argument('<source>', 'directory containing date folders (YYYY-MM-DD or YYYY-MM-DD-project)');

    const handled = parseArguments(program, argv);
    if (handled !== null) return handled;

    let sourceRoot: string;
    try {
        sourceRoot = await requireDirectory('Source', program.args[0], 'read');
    } catch (err) {
        if (err instanceof ValidationError) {
            io.logger.error(err.message);
            return EXIT_USAGE;
        }
        throw err;
    }

    const plan = await planFixes(new NodeFileSystem(), new Classifier(createClassifierConfig()), sourceRoot);

    if (plan.nonDateFolders.length > 0) {
        io.logger.warn(`Warning: Non-compliant folders found in root: ${plan.nonDateFolders.join(', ')}`);
    }

    if (plan.managedCount === 0) {
        io.stderr('# No Insta360 files found in source directory.');
        return EXIT_OK;
    }

    if (plan.moves.length === 0) {
        io.stderr('# All Insta360 files are already compliant.');
        return EXIT_OK;
    }

    renderScript(plan).forEach(line => io.stdout(line));
    return EXIT_OK;
}
