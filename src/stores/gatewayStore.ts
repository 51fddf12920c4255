import { createStore } from 'zustand/vanilla'
import type { StoreApi } from 'zustand/vanilla'
import type { Gateway } from '../lib/gateway'
import type { Outcome } from '../lib/errors'
import { failure } from '../lib/errors'
import { logDebug } from '../../main/logger.js'

export interface GatewayState {
    gateways: Gateway[]
    currentGateway: Gateway | null

    /** Append an unseen gateway and make it current. Returns false if already known. */
    register: (gateway: Gateway) => boolean
    select: (gateway: Gateway) => Outcome
    current: () => Gateway | null
    has: (gateway: Gateway) => boolean
}

export type GatewayStore = StoreApi<GatewayState>

export function createGatewayStore(): GatewayStore {
    return createStore<GatewayState>()((set, get) => ({
        gateways: [],
        currentGateway: null,

        register: (gateway) => {
            if (get().has(gateway)) return false
            set((state) => ({ gateways: [...state.gateways, gateway], currentGateway: gateway }))
            logDebug(`[GATEWAYS] Registered ${gateway.name}`)
            return true
        },
        select: (gateway) => {
            if (!get().has(gateway)) return failure('UnknownGateway')
            set({ currentGateway: gateway })
            logDebug(`[GATEWAYS] Selected ${gateway.name}`)
            return { ok: true }
        },
        current: () => get().currentGateway,
        has: (gateway) => get().gateways.includes(gateway),
    }))
}
