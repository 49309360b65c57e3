import path from 'path';
import type { ClassifierConfig } from './config';

export class Classifier {
    constructor(private readonly config: ClassifierConfig) {}

    isManaged(filePath: string): boolean {
        const name = path.basename(filePath);

        // Sentinel names come straight from the camera, so no case folding here
        if (this.config.filenames.has(name)) {
            return true;
        }

        return this.config.extensions.has(path.extname(name).toLowerCase());
    }
}
