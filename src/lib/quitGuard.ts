import { APP_NAME } from './constants';
import type { Folder, Gateway } from './gateway';

export type QuitClass = 'loading' | 'syncing' | 'idle';
export type QuitResponse = 'yes' | 'no';
export type QuitIcon = 'warning' | 'question';

export interface QuitClassification {
    kind: QuitClass
    icon: QuitIcon
    informativeText: string
    buttons: readonly QuitResponse[]
    defaultButton: QuitResponse
}

export interface QuitPrompt {
    /** Window title; macOS sheets carry none. */
    title: string | null
    text: string
    informativeText: string | null
    icon: QuitIcon
    buttons: readonly QuitResponse[]
    defaultButton: QuitResponse
    /** Windows leaves a stale tray icon behind unless it is hidden before exit. */
    hideTrayBeforeQuit: boolean
}

const QUIT_BUTTONS: readonly QuitResponse[] = ['yes', 'no'];

/** "Loading..." and not yet synced. */
export function isFolderLoading(folder: Folder): boolean {
    const noStatus = folder.status == null || folder.status === 'loading';
    return noStatus && folder.lastSyncTime == null;
}

function scanFolders(gateways: readonly Gateway[]): QuitClass {
    let syncing = false;
    for (const gateway of gateways) {
        for (const folder of gateway.magicFolders) {
            if (isFolderLoading(folder)) return 'loading';
            if (folder.status === 'syncing') syncing = true;
        }
    }
    return syncing ? 'syncing' : 'idle';
}

export function informativeTextFor(kind: QuitClass, appName: string = APP_NAME): string {
    switch (kind) {
        case 'loading':
            return 'One or more folders have not finished loading. If these '
                + 'folders were recently added, you may need to add them again.';
        case 'syncing':
            return 'One or more folders are currently syncing. If you quit, any '
                + 'pending upload or download operations will be cancelled '
                + `until you launch ${appName} again.`;
        case 'idle':
            return `If you quit, ${appName} will stop synchronizing your folders until `
                + 'you launch it again.';
    }
}

/**
 * Classify a quit request across every folder of every gateway. A loading
 * folder anywhere outranks any number of syncing ones.
 */
export function classifyQuit(gateways: readonly Gateway[], appName: string = APP_NAME): QuitClassification {
    const kind = scanFolders(gateways);
    return {
        kind,
        icon: kind === 'idle' ? 'question' : 'warning',
        informativeText: informativeTextFor(kind, appName),
        buttons: QUIT_BUTTONS,
        defaultButton: 'no',
    };
}

export function formatQuitPrompt(
    classification: QuitClassification,
    platform: NodeJS.Platform = process.platform,
    appName: string = APP_NAME,
): QuitPrompt {
    const question = 'Are you sure you wish to quit?';
    const base = {
        icon: classification.icon,
        buttons: classification.buttons,
        defaultButton: classification.defaultButton,
        hideTrayBeforeQuit: platform === 'win32',
    };
    if (platform === 'darwin') {
        return { ...base, title: null, text: question, informativeText: classification.informativeText };
    }
    return {
        ...base,
        title: `Exit ${appName}?`,
        text: `${question} ${classification.informativeText}`,
        informativeText: null,
    };
}
