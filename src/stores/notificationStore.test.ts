import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../main/logger.js', () => ({
    logDebug: vi.fn(),
}));

import { createNotificationStore } from './notificationStore';
import type { NotificationCallbacks, NotificationStore } from './notificationStore';
import type { Gateway } from '../lib/gateway';
import { makeGateway } from '../test-utils/mockGateway';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createCallbacks() {
    return {
        onDisplayRequested: vi.fn(),
        onIndicatorUpdate: vi.fn(),
        onDesktopNotification: vi.fn(),
    } satisfies NotificationCallbacks;
}

describe('notificationStore', () => {
    let known: Gateway[];
    let store: NotificationStore;
    let cbs: ReturnType<typeof createCallbacks>;
    const grid = makeGateway({ name: 'Example Grid' });

    beforeEach(() => {
        vi.useFakeTimers();
        known = [grid];
        store = createNotificationStore((g) => known.includes(g));
        cbs = createCallbacks();
        store.getState().setCallbacks(cbs);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    // -----------------------------------------------------------------------
    // enqueue
    // -----------------------------------------------------------------------

    describe('enqueue', () => {
        it('displays straight away while the window is visible', () => {
            store.getState().setVisible(true);
            const result = store.getState().enqueue(grid, 'Hello', 'Body');

            expect(result).toEqual({ ok: true, disposition: 'displayed' });
            expect(cbs.onDisplayRequested).toHaveBeenCalledWith({ gateway: grid, title: 'Hello', body: 'Body' });
            expect(store.getState().pending).toBeNull();
            expect(store.getState().unread).toHaveLength(1);
            expect(cbs.onIndicatorUpdate).toHaveBeenCalledWith(1);
        });

        it('holds the message while the window is hidden', () => {
            const result = store.getState().enqueue(grid, 'Hello', 'Body');

            expect(result).toEqual({ ok: true, disposition: 'pending' });
            expect(cbs.onDisplayRequested).not.toHaveBeenCalled();
            expect(store.getState().pending).toEqual({ gateway: grid, title: 'Hello', body: 'Body' });
        });

        it('keeps only the latest pending message but counts every unread one', () => {
            store.getState().enqueue(grid, 'First', 'one');
            store.getState().enqueue(grid, 'Second', 'two');

            expect(store.getState().pending).toEqual({ gateway: grid, title: 'Second', body: 'two' });
            expect(store.getState().unread.map((n) => n.title)).toEqual(['First', 'Second']);
            expect(cbs.onIndicatorUpdate).toHaveBeenLastCalledWith(2);
        });

        it('drops messages for a gateway outside the registry', () => {
            const stranger = makeGateway({ name: 'stranger' });
            const result = store.getState().enqueue(stranger, 'Hi', 'there');

            expect(result).toEqual({ ok: false, error: 'UnknownGateway' });
            expect(store.getState().unread).toHaveLength(0);
            expect(store.getState().pending).toBeNull();
            expect(cbs.onIndicatorUpdate).not.toHaveBeenCalled();
        });

        it('survives a callback that throws', () => {
            cbs.onIndicatorUpdate.mockImplementation(() => { throw new Error('tray gone'); });
            store.getState().setVisible(true);

            expect(store.getState().enqueue(grid, 'Hello', 'Body')).toEqual({ ok: true, disposition: 'displayed' });
            expect(store.getState().unread).toHaveLength(1);
            expect(cbs.onDisplayRequested).toHaveBeenCalledTimes(1);
        });
    });

    // -----------------------------------------------------------------------
    // onShown
    // -----------------------------------------------------------------------

    describe('onShown', () => {
        it('shows only the most recent pending message, on the next tick', () => {
            store.getState().enqueue(grid, 'First', 'one');
            store.getState().enqueue(grid, 'Second', 'two');

            expect(store.getState().onShown()).toBe(true);
            expect(store.getState().pending).toBeNull();
            expect(store.getState().visible).toBe(true);
            expect(cbs.onDisplayRequested).not.toHaveBeenCalled();

            vi.runAllTimers();
            expect(cbs.onDisplayRequested).toHaveBeenCalledTimes(1);
            expect(cbs.onDisplayRequested).toHaveBeenCalledWith({ gateway: grid, title: 'Second', body: 'two' });
            expect(store.getState().unread).toHaveLength(2);
        });

        it('does nothing without a pending message', () => {
            expect(store.getState().onShown()).toBe(false);
            vi.runAllTimers();
            expect(cbs.onDisplayRequested).not.toHaveBeenCalled();
            expect(store.getState().visible).toBe(true);
        });

        it('still displays if the window is hidden again before the tick', () => {
            store.getState().enqueue(grid, 'Hello', 'Body');
            store.getState().onShown();
            store.getState().setVisible(false);

            vi.advanceTimersByTime(0);
            expect(cbs.onDisplayRequested).toHaveBeenCalledWith({ gateway: grid, title: 'Hello', body: 'Body' });
        });

        it('displays new arrivals directly once shown', () => {
            store.getState().onShown();
            expect(store.getState().enqueue(grid, 'Hello', 'Body')).toEqual({ ok: true, disposition: 'displayed' });
        });
    });

    // -----------------------------------------------------------------------
    // onDisplayed
    // -----------------------------------------------------------------------

    describe('onDisplayed', () => {
        it('removes the exact message and updates the indicator', () => {
            store.getState().enqueue(grid, 'First', 'one');
            store.getState().enqueue(grid, 'Second', 'two');
            cbs.onIndicatorUpdate.mockClear();

            expect(store.getState().onDisplayed(grid, 'First', 'one')).toBe(true);
            expect(store.getState().unread.map((n) => n.title)).toEqual(['Second']);
            expect(cbs.onIndicatorUpdate).toHaveBeenCalledWith(1);
        });

        it('removes one copy of a repeated message at a time', () => {
            store.getState().enqueue(grid, 'Same', 'body');
            store.getState().enqueue(grid, 'Same', 'body');

            store.getState().onDisplayed(grid, 'Same', 'body');
            expect(store.getState().unread).toHaveLength(1);
        });

        it('ignores a message that is no longer unread', () => {
            store.getState().enqueue(grid, 'First', 'one');
            store.getState().onDisplayed(grid, 'First', 'one');
            cbs.onIndicatorUpdate.mockClear();

            expect(store.getState().onDisplayed(grid, 'First', 'one')).toBe(false);
            expect(store.getState().onDisplayed(grid, 'First', 'different')).toBe(false);
            expect(cbs.onIndicatorUpdate).not.toHaveBeenCalled();
        });
    });

    // -----------------------------------------------------------------------
    // Message kinds
    // -----------------------------------------------------------------------

    describe('message kinds', () => {
        it('raises a desktop notification and queues the raw news message', () => {
            store.getState().receiveMessage(grid, '<p>Maintenance <b>tonight</b></p>');

            expect(cbs.onDesktopNotification).toHaveBeenCalledWith('New message from Example Grid', '\n\nMaintenance tonight');
            expect(store.getState().pending).toEqual({
                gateway: grid,
                title: 'New message from Example Grid',
                body: '<p>Maintenance <b>tonight</b></p>',
            });
        });

        it('skips the desktop notification for an unknown gateway', () => {
            const result = store.getState().receiveMessage(makeGateway({ name: 'stranger' }), 'hi');
            expect(result).toEqual({ ok: false, error: 'UnknownGateway' });
            expect(cbs.onDesktopNotification).not.toHaveBeenCalled();
        });

        it('queues a fixed upgrade warning', () => {
            store.getState().setVisible(true);
            store.getState().upgradeRequired(grid);

            expect(cbs.onDisplayRequested).toHaveBeenCalledWith({
                gateway: grid,
                title: 'Upgrade required',
                body: 'A message was received from Example Grid in an unsupported format. This suggests that '
                    + 'you are running an out-of-date version of Gridpane.\n\n'
                    + 'To avoid seeing this warning, please upgrade to the latest version.',
            });
        });

        it('uses the configured application name', () => {
            const other = createNotificationStore(() => true, 'Other');
            other.getState().upgradeRequired(grid);
            expect(other.getState().pending?.body).toContain('out-of-date version of Other.');
        });
    });
});
