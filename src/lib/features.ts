import { FEATURES_SECTION } from './constants';
import type { InviteControl } from './enablement';

export interface PreferenceReader {
    get: (section: string, option: string) => string
}

export interface FeatureFlags {
    gridInvites: boolean
    invites: boolean
    multipleGrids: boolean
}

export const DEFAULT_FEATURES: FeatureFlags = {
    gridInvites: true,
    invites: true,
    multipleGrids: true,
};

function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'NotFound';
}

/** A flag is off only when it reads "false" (any case); a missing entry leaves it on. */
function readFlag(prefs: PreferenceReader, option: string): boolean {
    try {
        return prefs.get(FEATURES_SECTION, option).toLowerCase() !== 'false';
    } catch (err) {
        if (isNotFound(err)) return true;
        throw err;
    }
}

export function readFeatureFlags(prefs: PreferenceReader): FeatureFlags {
    return {
        gridInvites: readFlag(prefs, 'grid_invites'),
        invites: readFlag(prefs, 'invites'),
        multipleGrids: readFlag(prefs, 'multiple_grids'),
    };
}

export function inviteControlFor(flags: FeatureFlags): InviteControl {
    if (flags.gridInvites) return 'menu';
    if (flags.invites) return 'enter-code';
    return 'none';
}
