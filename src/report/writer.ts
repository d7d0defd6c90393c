import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ReportFile } from './html.js';
import { createOutputError } from '../types/errors.js';

export const OUTPUT_SUBDIRECTORIES = ['Documents', 'Formula Atlas'] as const;

/**
 * Default output location: ~/Documents/Formula Atlas
 */
export function defaultOutputDirectory(): string {
    return path.join(os.homedir(), ...OUTPUT_SUBDIRECTORIES);
}

/**
 * Writes report files into one directory, creating it when missing
 */
export class ReportWriter {
    readonly directory: string;

    constructor(directory: string = defaultOutputDirectory()) {
        this.directory = directory;
    }

    async init(): Promise<void> {
        try {
            await fs.mkdir(this.directory, { recursive: true });
        } catch (e) {
            throw createOutputError(`cannot create ${this.directory}: ${e instanceof Error ? e.message : String(e)}`, {
                directory: this.directory,
            });
        }
    }

    /**
     * Write every file; returns their full paths in order
     */
    async write(files: readonly ReportFile[]): Promise<string[]> {
        await this.init();
        const written: string[] = [];
        for (const file of files) {
            const filePath = path.join(this.directory, file.fileName);
            try {
                await fs.writeFile(filePath, file.content, 'utf-8');
            } catch (e) {
                throw createOutputError(`cannot write ${filePath}: ${e instanceof Error ? e.message : String(e)}`, { filePath });
            }
            written.push(filePath);
        }
        return written;
    }
}
