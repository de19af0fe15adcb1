// tests/unit/error_context.test.ts

import { ErrorContext, SerializedErrorContext } from '../../src/core/errors/ErrorContext';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('ErrorContext', () => {
    it('should start with a random identifier, a UTC timestamp and no metadata', () => {
        const before = Date.now();
        const context = ErrorContext.create();
        const after = Date.now();

        expect(context.identifier).toMatch(UUID_V4);
        expect(context.timestamp.endsWith('Z')).toBe(true);
        expect(context.occurredAt.getTime()).toBeGreaterThanOrEqual(before);
        expect(context.occurredAt.getTime()).toBeLessThanOrEqual(after);
        expect(context.metadataCount).toBe(0);
        expect(context.cause).toBeUndefined();
    });

    it('should give every context its own identifier', () => {
        expect(ErrorContext.create().identifier).not.toBe(ErrorContext.create().identifier);
    });

    it('should accept initial metadata as pairs or a record', () => {
        const fromPairs = ErrorContext.create({ metadata: [['b', '2'], ['a', '1']] });
        const fromRecord = ErrorContext.create({ metadata: { b: '2', a: '1' } });

        expect(fromPairs.metadataEntries()).toEqual([['b', '2'], ['a', '1']]);
        expect(fromRecord.metadataEntries()).toEqual([['b', '2'], ['a', '1']]);
    });

    describe('withMetadata', () => {
        it('should return a new context and leave the original untouched', () => {
            const original = ErrorContext.create();
            const updated = original.withMetadata('query', 'search term');

            expect(updated).not.toBe(original);
            expect(original.hasMetadata('query')).toBe(false);
            expect(updated.getMetadata('query')).toBe('search term');
            expect(updated.identifier).toBe(original.identifier);
            expect(updated.timestamp).toBe(original.timestamp);
        });

        it('should append new keys and overwrite existing ones in place', () => {
            const context = ErrorContext.create()
                .withMetadata('endpoint', '/api/v1/search')
                .withMetadata('user_id', 'user-123')
                .withMetadata('timeout_ms', '5000')
                .withMetadata('user_id', 'user-456');

            expect(context.metadataEntries()).toEqual([
                ['endpoint', '/api/v1/search'],
                ['user_id', 'user-456'],
                ['timeout_ms', '5000'],
            ]);
            expect(context.metadataCount).toBe(3);
        });

        it('should carry the cause over', () => {
            const cause = ErrorContext.create();
            const context = ErrorContext.create({ cause }).withMetadata('step', 'commit');
            expect(context.cause).toBe(cause);
        });
    });

    it('should hand out metadata copies', () => {
        const context = ErrorContext.create({ metadata: { key: 'value' } });
        const view = context.metadata;

        expect([...view]).toEqual([['key', 'value']]);
        expect(view).not.toBe(context.metadata);
    });

    it('should be frozen', () => {
        expect(Object.isFrozen(ErrorContext.create())).toBe(true);
    });

    describe('cause chain', () => {
        const root = ErrorContext.create({ metadata: { stage: 'connect' } });
        const middle = ErrorContext.create({ cause: root, metadata: { stage: 'query' } });
        const latest = ErrorContext.create({ cause: middle, metadata: { stage: 'handler' } });

        it('should list the chain newest first', () => {
            expect(latest.chain()).toEqual([latest, middle, root]);
        });

        it('should reconstruct history oldest first', () => {
            expect(latest.history().map(link => link.getMetadata('stage'))).toEqual(['connect', 'query', 'handler']);
        });

        it('should find the root cause', () => {
            expect(latest.rootCause()).toBe(root);
            expect(root.rootCause()).toBe(root);
        });
    });

    describe('toJSON', () => {
        it('should serialize metadata as ordered pairs and nest the cause', () => {
            const cause = ErrorContext.restore({
                identifier: 'cause-id',
                timestamp: '2024-03-01T10:00:00.000Z',
                metadata: [['name', 'Error']],
            });
            const context = ErrorContext.restore({
                identifier: 'context-id',
                timestamp: '2024-03-01T10:00:01.500Z',
                metadata: [['z', 'last'], ['a', 'first']],
                cause,
            });

            expect(context.toJSON()).toEqual({
                identifier: 'context-id',
                timestamp: '2024-03-01T10:00:01.500Z',
                metadata: [['z', 'last'], ['a', 'first']],
                cause: {
                    identifier: 'cause-id',
                    timestamp: '2024-03-01T10:00:00.000Z',
                    metadata: [['name', 'Error']],
                },
            });
        });

        it('should omit an absent cause', () => {
            expect('cause' in ErrorContext.create().toJSON()).toBe(false);
        });

        it('should serialize very deep cause chains', () => {
            let context = ErrorContext.create({ metadata: [['depth', '0']] });
            for (let depth = 1; depth < 5_000; depth++) {
                context = ErrorContext.create({ cause: context, metadata: [['depth', String(depth)]] });
            }

            let link: SerializedErrorContext | undefined = context.toJSON();
            let links = 0;
            let last: SerializedErrorContext | undefined;
            while (link !== undefined) {
                links++;
                last = link;
                link = link.cause;
            }
            expect(links).toBe(5_000);
            expect(last?.metadata).toEqual([['depth', '0']]);
            expect(last?.identifier).toBe(context.rootCause().identifier);
        });
    });
});
