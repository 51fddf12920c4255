import { vi } from 'vitest';
import type { Folder, Gateway, GatewayMessageListener, GatewayMessageSource } from '../lib/gateway';

export function makeFolder(overrides: Partial<Folder> = {}): Folder {
    return { name: 'Documents', status: 'synced', lastSyncTime: 1_700_000_000_000, ...overrides };
}

export function makeGateway(overrides: Partial<Gateway> = {}): Gateway {
    return { name: 'grid-a', zkapAuthRequired: false, zkapsRemaining: null, magicFolders: [], ...overrides };
}

/**
 * A message source whose subscriber can be driven from the test.
 *
 * Usage in tests:
 *   const mock = createMockMessageSource();
 *   const gateway = makeGateway({ newscapMessages: mock.source });
 *   mock.emitMessage('<p>Hi</p>');
 */
export function createMockMessageSource() {
    let listener: GatewayMessageListener | null = null;
    const unsubscribe = vi.fn(() => { listener = null; });
    const subscribe = vi.fn((l: GatewayMessageListener) => {
        listener = l;
        return unsubscribe;
    });
    const source: GatewayMessageSource = { subscribe };

    return {
        source,
        subscribe,
        unsubscribe,
        emitMessage: (message: string) => listener?.onMessage(message),
        emitUpgradeRequired: () => listener?.onUpgradeRequired(),
    };
}
