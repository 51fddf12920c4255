import type { Gateway, ViewKind } from './gateway';

/** Which invite control the toolbar carries, fixed at startup from feature flags. */
export type InviteControl = 'menu' | 'enter-code' | 'none';

export type EnablementLevel = 'full' | 'restricted';

export interface Controls {
    addFolder: boolean
    history: boolean
    recovery: boolean
    foldersPanel: boolean
    quotaPanel: boolean
    gridSelector: boolean
    /** Absent when the toolbar has no invite control. */
    invites?: boolean
}

export interface EnablementState {
    level: EnablementLevel
    controls: Controls
    /** View the window must switch to, or null to keep the user's choice. */
    forcedView: ViewKind | null
}

/** Uninitialized quota counts as "not required" unless auth is explicitly required. */
export function isQuotaExhausted(gateway: Gateway): boolean {
    return gateway.zkapAuthRequired === true && (gateway.zkapsRemaining ?? 0) <= 0;
}

export function computeEnablement(gateway: Gateway, inviteControl: InviteControl = 'menu'): EnablementState {
    const restricted = isQuotaExhausted(gateway);
    const enabled = !restricted;
    const controls: Controls = {
        addFolder: enabled,
        history: enabled,
        recovery: enabled,
        foldersPanel: enabled,
        quotaPanel: true,
        gridSelector: enabled,
    };
    if (inviteControl !== 'none') controls.invites = enabled;

    return {
        level: restricted ? 'restricted' : 'full',
        controls,
        // New users out of quota land on the purchase screen, not an empty folder list
        forcedView: restricted && gateway.magicFolders.length === 0 ? 'quota' : null,
    };
}

/** The view a gateway opens on when its panels are first created. */
export function initialView(gateway: Gateway): ViewKind {
    return computeEnablement(gateway, 'none').forcedView ?? 'folders';
}
