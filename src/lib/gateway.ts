export type FolderStatus = 'unknown' | 'loading' | 'syncing' | 'synced' | 'error';

export interface Folder {
    name: string
    /** Unset until the sync engine reports on the folder. */
    status?: FolderStatus | null
    /** Epoch milliseconds of the last completed sync, if any. */
    lastSyncTime?: number | null
}

export interface GatewayMessageListener {
    onMessage: (message: string) => void
    onUpgradeRequired: () => void
}

export interface GatewayMessageSource {
    /** Returns an unsubscribe function. */
    subscribe: (listener: GatewayMessageListener) => () => void
}

/**
 * A snapshot of one grid connection, owned by the gateway subsystem.
 * Gateways are compared by identity.
 */
export interface Gateway {
    name: string
    zkapAuthRequired?: boolean
    zkapsRemaining?: number | null
    magicFolders: readonly Folder[]
    newscapMessages?: GatewayMessageSource
}

export type ViewKind = 'folders' | 'history' | 'quota';

export const VIEW_KINDS: readonly ViewKind[] = ['folders', 'history', 'quota'];

export interface PendingNotification {
    gateway: Gateway
    title: string
    body: string
}

export function sameNotification(a: PendingNotification, b: PendingNotification): boolean {
    return a.gateway === b.gateway && a.title === b.title && a.body === b.body;
}
