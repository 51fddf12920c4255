import path from 'node:path';
import fs from 'node:fs';
import { getLogDir } from './paths.js';

let debugLogPath: string | null = null;

function getLogPath(): string {
    if (!debugLogPath) {
        const dir = getLogDir();
        fs.mkdirSync(dir, { recursive: true });
        debugLogPath = path.join(dir, 'debug.log');
    }
    return debugLogPath;
}

export function logDebug(message: string): void {
    try {
        const timestamp = new Date().toISOString();
        fs.appendFileSync(getLogPath(), `[${timestamp}] ${message}\n`);
    } catch {
        // Ignore if we can't write to log directory
    }
}

/** Forget the cached log path so the next write re-reads the environment. */
export function resetLogPath(): void {
    debugLogPath = null;
}
