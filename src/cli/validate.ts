import fs from 'fs-extra';
import path from 'path';
import { ValidationError } from '../errors';

export async function requireDirectory(label: string, dir: string, access: 'read' | 'write'): Promise<string> {
    const resolved = path.resolve(dir);

    if (!await fs.pathExists(resolved)) {
        throw new ValidationError(`${label} directory does not exist: ${resolved}`);
    }
    if (!(await fs.stat(resolved)).isDirectory()) {
        throw new ValidationError(`${label} is not a directory: ${resolved}`);
    }

    const mode = access === 'write' ? fs.constants.W_OK : fs.constants.R_OK;
    try {
        await fs.access(resolved, mode);
    } catch (err) {
        throw new ValidationError(`${label} directory is not ${access === 'write' ? 'writable' : 'readable'}: ${resolved} (${err instanceof Error ? err.message : String(err)})`);
    }
    return resolved;
}
