import path from 'node:path';
import os from 'node:os';

export const CONFIG_DIR_ENV = 'GRIDPANE_CONFIG_DIR';
export const LOG_DIR_ENV = 'GRIDPANE_LOG_DIR';

function defaultConfigDir(platform: NodeJS.Platform = process.platform): string {
    const home = os.homedir();
    switch (platform) {
        case 'win32':
            return path.join(process.env.APPDATA ?? path.join(home, 'AppData', 'Roaming'), 'Gridpane');
        case 'darwin':
            return path.join(home, 'Library', 'Application Support', 'Gridpane');
        default: {
            const xdg = process.env.XDG_CONFIG_HOME?.trim();
            return path.join(xdg ? xdg : path.join(home, '.config'), 'gridpane');
        }
    }
}

export function getConfigDir(platform?: NodeJS.Platform): string {
    const envDir = process.env[CONFIG_DIR_ENV]?.trim();
    if (envDir) return path.resolve(envDir);
    return defaultConfigDir(platform);
}

export function getLogDir(): string {
    const envDir = process.env[LOG_DIR_ENV]?.trim();
    if (envDir) return path.resolve(envDir);
    return path.join(getConfigDir(), 'logs');
}

export function getPreferencesPath(): string {
    return path.join(getConfigDir(), 'preferences.ini');
}
