import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import { APP_NAME } from '../lib/constants'
import { failure } from '../lib/errors'
import type { Outcome } from '../lib/errors'
import { sameNotification } from '../lib/gateway'
import type { Gateway, PendingNotification } from '../lib/gateway'
import { UPGRADE_REQUIRED_TITLE, newsPlainText, newsTitle, upgradeRequiredBody } from '../lib/messages'
import { logDebug } from '../../main/logger.js'

export interface NotificationCallbacks {
    onDisplayRequested: (notification: PendingNotification) => void
    /** Unread count changed; refresh the tray badge. */
    onIndicatorUpdate: (unreadCount: number) => void
    onDesktopNotification?: (title: string, body: string) => void
}

export type Disposition = 'displayed' | 'pending'

export interface NotificationState {
    unread: PendingNotification[]
    /** At most one message waits for the window to be shown; newer arrivals replace it. */
    pending: PendingNotification | null
    visible: boolean

    setCallbacks: (callbacks: NotificationCallbacks) => void
    setVisible: (visible: boolean) => void
    enqueue: (gateway: Gateway, title: string, body: string) => Outcome<{ disposition: Disposition }>
    onShown: () => boolean
    onDisplayed: (gateway: Gateway, title: string, body: string) => boolean
    receiveMessage: (gateway: Gateway, message: string) => Outcome<{ disposition: Disposition }>
    upgradeRequired: (gateway: Gateway) => Outcome<{ disposition: Disposition }>
}

export type NotificationStore = StoreApi<NotificationState>

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err)
}

export function createNotificationStore(
    isKnownGateway: (gateway: Gateway) => boolean,
    appName: string = APP_NAME,
): NotificationStore {
    let callbacks: NotificationCallbacks | null = null

    function requestDisplay(notification: PendingNotification): void {
        try {
            callbacks?.onDisplayRequested(notification)
        } catch (e) {
            logDebug(`[NOTIFY] Display request failed: ${errorMessage(e)}`)
        }
    }

    function updateIndicator(unreadCount: number): void {
        try {
            callbacks?.onIndicatorUpdate(unreadCount)
        } catch (e) {
            logDebug(`[NOTIFY] Indicator update failed: ${errorMessage(e)}`)
        }
    }

    return createStore<NotificationState>()((set, get) => ({
        unread: [],
        pending: null,
        visible: false,

        setCallbacks: (cb) => { callbacks = cb },
        setVisible: (visible) => set({ visible }),

        enqueue: (gateway, title, body) => {
            if (!isKnownGateway(gateway)) {
                logDebug(`[NOTIFY] Dropped message for unknown gateway ${gateway.name}`)
                return failure('UnknownGateway')
            }
            const notification: PendingNotification = { gateway, title, body }
            set((state) => ({ unread: [...state.unread, notification] }))
            updateIndicator(get().unread.length)

            if (get().visible) {
                requestDisplay(notification)
                return { ok: true, disposition: 'displayed' }
            }
            if (get().pending) logDebug(`[NOTIFY] Replacing pending message from ${get().pending?.gateway.name}`)
            set({ pending: notification })
            return { ok: true, disposition: 'pending' }
        },

        onShown: () => {
            const { pending } = get()
            set({ visible: true, pending: null })
            if (!pending) return false
            // Not from inside the show handler itself; the request survives a re-hide
            setTimeout(() => requestDisplay(pending), 0)
            return true
        },

        onDisplayed: (gateway, title, body) => {
            const target: PendingNotification = { gateway, title, body }
            const { unread } = get()
            const index = unread.findIndex((n) => sameNotification(n, target))
            if (index === -1) return false
            set({ unread: unread.filter((_, i) => i !== index) })
            updateIndicator(get().unread.length)
            return true
        },

        receiveMessage: (gateway, message) => {
            const title = newsTitle(gateway)
            if (isKnownGateway(gateway)) {
                try {
                    callbacks?.onDesktopNotification?.(title, newsPlainText(message))
                } catch (e) {
                    logDebug(`[NOTIFY] Desktop notification failed: ${errorMessage(e)}`)
                }
            }
            return get().enqueue(gateway, title, message)
        },

        upgradeRequired: (gateway) =>
            get().enqueue(gateway, UPGRADE_REQUIRED_TITLE, upgradeRequiredBody(gateway, appName)),
    }))
}
