import { WorldState } from '../src/ledger';
import { LedgerEventName } from '../src/models/LedgerEvent';
import { MemoryBackend } from './support/MemoryBackend';
import { T0 } from './support/harness';

describe('WorldState', () => {
    let backend: MemoryBackend;
    let state: WorldState;

    beforeEach(() => {
        backend = new MemoryBackend(T0);
        state = new WorldState(backend);
    });

    it('builds composite keys through the backend', () => {
        expect(state.key('donation', 4)).toBe('\u0000donation\u00004\u0000');
    });

    it('refuses empty key parts the way the stub does', () => {
        expect(() => state.key('wallet', '')).toThrow('object type or attribute not a non-zero length string');
    });

    it('reads its own writes before they reach the backend', async () => {
        const key = state.key('wallet', 'alice');
        state.write(key, { balance: '10' });

        expect(await state.read(key)).toEqual({ balance: '10' });
        expect(backend.store.size).toBe(0);

        await state.flush();
        expect(await new WorldState(backend).read(key)).toEqual({ balance: '10' });
    });

    it('serialises bigints as decimal strings', async () => {
        const key = state.key('vault');
        state.write(key, { total: 12n });

        expect(await state.read(key)).toEqual({ total: '12' });
    });

    it('treats empty backend values as missing', async () => {
        const key = state.key('role', 'bob');
        expect(await state.exists(key)).toBe(false);

        await backend.putState(key, Buffer.from('{"roles":[]}'));
        expect(await state.exists(key)).toBe(true);
        expect(await state.read(key)).toEqual({ roles: [] });
    });

    it('restores writes and the pending event on rollback', async () => {
        const key = state.key('escrow', 1);
        state.write(key, { balance: '5' });
        const checkpoint = state.checkpoint();

        state.write(key, { balance: '0' });
        state.emit(LedgerEventName.DONATION_DISTRIBUTED, { id: 1 });
        state.rollback(checkpoint);

        expect(await state.read(key)).toEqual({ balance: '5' });
        expect(state.pendingEvent()).toBeUndefined();
    });

    it('hands exactly one event to the backend per flush', async () => {
        state.emit(LedgerEventName.DONATION_CREATED, { id: 0 });
        state.emit(LedgerEventName.DONATION_FUNDED, { id: 0, amount: 3n });

        await state.flush();
        await state.flush();

        expect(backend.events).toEqual([{ name: 'DonationFunded', payload: { id: 0, amount: '3' } }]);
    });

    it('reads the clock in whole seconds', () => {
        backend.advance(90);

        expect(state.now()).toBe(T0 + 90);
    });
});
