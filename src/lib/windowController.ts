import { APP_NAME } from './constants';
import { inviteControlFor, readFeatureFlags } from './features';
import type { FeatureFlags, PreferenceReader } from './features';
import type { Gateway } from './gateway';
import type { Outcome } from './errors';
import { classifyQuit, formatQuitPrompt } from './quitGuard';
import type { QuitPrompt } from './quitGuard';
import { createGatewayStore } from '../stores/gatewayStore';
import type { GatewayStore } from '../stores/gatewayStore';
import { createNotificationStore } from '../stores/notificationStore';
import type { NotificationStore } from '../stores/notificationStore';
import { createViewStore } from '../stores/viewStore';
import type { GatewayView, ViewStore } from '../stores/viewStore';
import { logDebug } from '../../main/logger.js';

export interface WindowControllerOptions {
    preferences: PreferenceReader
    platform?: NodeJS.Platform
    appName?: string
}

export interface WindowController {
    features: FeatureFlags
    gridSelectorVisible: boolean
    gateways: GatewayStore
    views: ViewStore
    notifications: NotificationStore
    /** Register unseen gateways; returns the view for the resulting current gateway. */
    populate: (gateways: readonly Gateway[]) => Outcome<GatewayView> | null
    confirmQuit: () => QuitPrompt
    /** Closing hides to the tray when there is one, otherwise it is a quit request. */
    onCloseRequested: (trayAvailable: boolean) => 'hide' | QuitPrompt
    dispose: () => void
}

/**
 * Binds the gateway registry, per-gateway view state and the notification
 * queue behind one object. Feature flags are read once, here.
 */
export function createWindowController(options: WindowControllerOptions): WindowController {
    const appName = options.appName ?? APP_NAME;
    const platform = options.platform ?? process.platform;
    const features = readFeatureFlags(options.preferences);

    const gateways = createGatewayStore();
    const views = createViewStore(gateways, {
        inviteControl: inviteControlFor(features),
        multipleGrids: features.multipleGrids,
        appName,
    });
    const notifications = createNotificationStore((g) => gateways.getState().has(g), appName);
    const subscriptions = new Map<Gateway, () => void>();

    function subscribe(gateway: Gateway): void {
        const source = gateway.newscapMessages;
        if (!source) return;
        subscriptions.set(gateway, source.subscribe({
            onMessage: (message) => { notifications.getState().receiveMessage(gateway, message); },
            onUpgradeRequired: () => { notifications.getState().upgradeRequired(gateway); },
        }));
    }

    function populate(list: readonly Gateway[]): Outcome<GatewayView> | null {
        for (const gateway of list) {
            if (gateways.getState().has(gateway)) continue;
            views.getState().registerGateway(gateway);
            gateways.getState().register(gateway);
            subscribe(gateway);
        }
        const current = gateways.getState().current();
        if (list.length === 0 || !current) return null;
        return views.getState().onGatewaySelected(current);
    }

    function confirmQuit(): QuitPrompt {
        const classification = classifyQuit(gateways.getState().gateways, appName);
        logDebug(`[QUIT] Quit requested; folders are ${classification.kind}`);
        return formatQuitPrompt(classification, platform, appName);
    }

    return {
        features,
        gridSelectorVisible: features.multipleGrids,
        gateways,
        views,
        notifications,
        populate,
        confirmQuit,
        onCloseRequested: (trayAvailable) => (trayAvailable ? 'hide' : confirmQuit()),
        dispose: () => {
            for (const unsubscribe of subscriptions.values()) unsubscribe();
            subscriptions.clear();
        },
    };
}
