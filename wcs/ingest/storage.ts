/**
 * GRIB Run Fetcher — Output Directory Backends
 *
 * One directory per run download. It is cleared and recreated before the
 * first file is written, so a directory always holds exactly one run.
 */

import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export interface OutputDirectory {
    /** Location shown in logs and recorded in the run artifact */
    readonly path: string;

    /** Remove all prior contents and make sure the directory exists */
    reset(): Promise<void>;

    /** Write (or overwrite) a file; returns its full path */
    write(name: string, data: Uint8Array): Promise<string>;

    writeText(name: string, text: string): Promise<string>;

    read(name: string): Promise<Uint8Array | null>;

    /** File names, sorted */
    list(): Promise<string[]>;
}

// =============================================================================
// Local Filesystem
// =============================================================================

export class LocalDirectory implements OutputDirectory {
    constructor(readonly path: string) { }

    async reset(): Promise<void> {
        await rm(this.path, { recursive: true, force: true });
        await mkdir(this.path, { recursive: true });
    }

    async write(name: string, data: Uint8Array): Promise<string> {
        const target = join(this.path, name);
        await writeFile(target, data);
        return target;
    }

    async writeText(name: string, text: string): Promise<string> {
        const target = join(this.path, name);
        await writeFile(target, text, 'utf8');
        return target;
    }

    async read(name: string): Promise<Uint8Array | null> {
        try {
            return new Uint8Array(await readFile(join(this.path, name)));
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
            throw error;
        }
    }

    async list(): Promise<string[]> {
        const entries = await readdir(this.path, { withFileTypes: true });
        return entries
            .filter((entry) => entry.isFile())
            .map((entry) => entry.name)
            .sort();
    }
}

// =============================================================================
// In-Memory
// =============================================================================

export class MemoryDirectory implements OutputDirectory {
    readonly files = new Map<string, Uint8Array>();

    constructor(readonly path = 'memory://run') { }

    async reset(): Promise<void> {
        this.files.clear();
    }

    async write(name: string, data: Uint8Array): Promise<string> {
        this.files.set(name, data.slice());
        return `${this.path}/${name}`;
    }

    async writeText(name: string, text: string): Promise<string> {
        return this.write(name, new TextEncoder().encode(text));
    }

    async read(name: string): Promise<Uint8Array | null> {
        return this.files.get(name) ?? null;
    }

    async list(): Promise<string[]> {
        return [...this.files.keys()].sort();
    }

    readText(name: string): string | null {
        const data = this.files.get(name);
        return data ? new TextDecoder().decode(data) : null;
    }
}
