import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import { APP_NAME } from '../lib/constants'
import { computeEnablement, initialView } from '../lib/enablement'
import type { EnablementState, InviteControl } from '../lib/enablement'
import { VIEW_KINDS } from '../lib/gateway'
import type { Gateway, ViewKind } from '../lib/gateway'
import { failure } from '../lib/errors'
import type { Outcome } from '../lib/errors'
import type { GatewayStore } from './gatewayStore'
import { logDebug } from '../../main/logger.js'

export interface ViewOptions {
    inviteControl: InviteControl
    /** Window title names the selected gateway only when several grids are allowed. */
    multipleGrids: boolean
    appName?: string
}

/** What the presentation layer renders for the selected gateway. */
export interface GatewayView {
    gateway: Gateway
    activeView: ViewKind
    enablement: EnablementState
    windowTitle: string
}

export interface ViewState {
    panels: Map<Gateway, readonly ViewKind[]>
    activeViews: Map<Gateway, ViewKind>
    windowTitle: string

    /** Create the folders/history/quota panels for a gateway. False if it already has them. */
    registerGateway: (gateway: Gateway) => boolean
    selectView: (kind: ViewKind) => Outcome<GatewayView>
    onGatewaySelected: (gateway: Gateway) => Outcome<GatewayView>
    /** Recompute after a quota or folder change on the current gateway. */
    refresh: () => Outcome<GatewayView>
    activeView: (gateway: Gateway) => ViewKind | null
}

export type ViewStore = StoreApi<ViewState>

export function createViewStore(gateways: GatewayStore, options: ViewOptions): ViewStore {
    const appName = options.appName ?? APP_NAME

    return createStore<ViewState>()((set, get) => {
        function render(gateway: Gateway): Outcome<GatewayView> {
            const enablement = computeEnablement(gateway, options.inviteControl)
            const { activeViews, panels } = get()
            let activeView = activeViews.get(gateway)
            if (activeView === undefined) return failure('NoSuchView')

            const forced = enablement.forcedView
            if (forced && forced !== activeView && panels.get(gateway)?.includes(forced)) {
                activeView = forced
                set({ activeViews: new Map(activeViews).set(gateway, forced) })
                logDebug(`[VIEWS] ${gateway.name} is out of storage-time; showing ${forced}`)
            }
            return { ok: true, gateway, activeView, enablement, windowTitle: get().windowTitle }
        }

        return {
            panels: new Map(),
            activeViews: new Map(),
            windowTitle: appName,

            registerGateway: (gateway) => {
                if (get().panels.has(gateway)) return false
                set((state) => ({
                    panels: new Map(state.panels).set(gateway, VIEW_KINDS),
                    activeViews: new Map(state.activeViews).set(gateway, initialView(gateway)),
                }))
                return true
            },

            selectView: (kind) => {
                const gateway = gateways.getState().current()
                if (!gateway || !get().panels.get(gateway)?.includes(kind)) {
                    logDebug(`[VIEWS] No ${kind} view registered for ${gateway?.name ?? '(none)'}`)
                    return failure('NoSuchView')
                }
                set((state) => ({ activeViews: new Map(state.activeViews).set(gateway, kind) }))
                return render(gateway)
            },

            onGatewaySelected: (gateway) => {
                if (!gateways.getState().has(gateway)) return failure('UnknownGateway')
                if (!get().panels.has(gateway)) return failure('NoSuchView')
                gateways.getState().select(gateway)
                if (options.multipleGrids) set({ windowTitle: `${appName} - ${gateway.name}` })
                return render(gateway)
            },

            refresh: () => {
                const gateway = gateways.getState().current()
                if (!gateway) return failure('UnknownGateway')
                return render(gateway)
            },

            activeView: (gateway) => get().activeViews.get(gateway) ?? null,
        }
    })
}
