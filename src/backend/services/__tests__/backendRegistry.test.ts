/**
 * Backend Registry Tests
 *
 * Registry construction must survive per-source load failures and keep
 * configuration order; the holder must swap registries atomically.
 */

import { SourceConfig } from '../../../shared/types';
import { BackendLoadError, QAErrorCode } from '../../errors';
import { silentLogger } from '../../logging';
import { BackendRegistry, RegistryHolder } from '../backendRegistry';
import { BackendOpener, RetrievalBackend } from '../retrievalBackend';

const SOURCES: SourceConfig[] = [
    { name: 'youtube', location: 'youtube' },
    { name: 'website', location: 'website' },
    { name: 'pdf', location: 'PDF' },
    { name: 'pptx', location: 'pptx' },
];

const fakeBackend = (sourceName: string): RetrievalBackend => ({
    sourceName,
    retrieve: jest.fn().mockResolvedValue([]),
});

describe('BackendRegistry', () => {
    describe('build', () => {
        it('should register every source that opens, in configuration order', async () => {
            const open: BackendOpener = jest.fn(async (name: string) => fakeBackend(name));

            const { registry, loadFailures, results } = await BackendRegistry.build(
                SOURCES,
                open,
                silentLogger
            );

            expect(registry.names()).toEqual(['youtube', 'website', 'pdf', 'pptx']);
            expect(registry.size).toBe(4);
            expect(loadFailures).toEqual([]);
            expect(results.every(({ result }) => result.ok)).toBe(true);
            expect(open).toHaveBeenCalledTimes(4);
            expect(open).toHaveBeenNthCalledWith(3, 'pdf', 'PDF');
        });

        it('should skip a source that fails to load and keep going', async () => {
            const open: BackendOpener = jest.fn(async (name: string) => {
                if (name === 'pdf') {
                    throw new Error('missing index.json');
                }
                return fakeBackend(name);
            });

            const { registry, loadFailures, results } = await BackendRegistry.build(
                SOURCES,
                open,
                silentLogger
            );

            expect(registry.names()).toEqual(['youtube', 'website', 'pptx']);
            expect(registry.has('pdf')).toBe(false);
            expect(loadFailures).toHaveLength(1);
            expect(loadFailures[0]).toBeInstanceOf(BackendLoadError);
            expect(loadFailures[0].sourceName).toBe('pdf');
            expect(loadFailures[0].code).toBe(QAErrorCode.BACKEND_LOAD_FAILED);
            expect(loadFailures[0].message).toBe('Error loading pdf index: missing index.json');
            expect(results.map(({ source, result }) => [source.name, result.ok])).toEqual([
                ['youtube', true],
                ['website', true],
                ['pdf', false],
                ['pptx', true],
            ]);
        });

        it('should produce an empty registry when nothing loads', async () => {
            const open: BackendOpener = jest.fn().mockRejectedValue(new Error('no such directory'));

            const { registry, loadFailures } = await BackendRegistry.build(
                SOURCES,
                open,
                silentLogger
            );

            expect(registry.size).toBe(0);
            expect([...registry]).toEqual([]);
            expect(loadFailures.map((e) => e.sourceName)).toEqual([
                'youtube',
                'website',
                'pdf',
                'pptx',
            ]);
        });

        it('should wrap non-Error throws', async () => {
            const open: BackendOpener = jest.fn().mockRejectedValue('boom');

            const { loadFailures } = await BackendRegistry.build(
                [{ name: 'pdf', location: 'PDF' }],
                open,
                silentLogger
            );

            expect(loadFailures[0].message).toBe('Error loading pdf index: boom');
            expect(loadFailures[0].cause).toBeInstanceOf(Error);
        });

        it('should log each load success and failure', async () => {
            const logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
            const open: BackendOpener = jest.fn(async (name: string) => {
                if (name === 'website') {
                    throw new Error('corrupt');
                }
                return fakeBackend(name);
            });

            await BackendRegistry.build(SOURCES.slice(0, 2), open, logger);

            expect(logger.log).toHaveBeenCalledWith('Loaded youtube index successfully.');
            expect(logger.warn).toHaveBeenCalledWith('Error loading website index: corrupt');
        });
    });

    describe('lookup and iteration', () => {
        it('should iterate in registration order', () => {
            const backends = ['pdf', 'youtube', 'pptx'].map(fakeBackend);
            const registry = new BackendRegistry(backends);

            expect([...registry]).toEqual(backends);
            expect(registry.get('youtube')).toBe(backends[1]);
            expect(registry.get('website')).toBeUndefined();
        });

        it('should reject duplicate source names', () => {
            expect(() => new BackendRegistry([fakeBackend('pdf'), fakeBackend('pdf')])).toThrow(
                'Duplicate source name: pdf'
            );
        });

        it('should be frozen after construction', () => {
            const registry = new BackendRegistry([fakeBackend('pdf')]);
            expect(Object.isFrozen(registry)).toBe(true);
        });
    });
});

describe('RegistryHolder', () => {
    it('should publish a new registry and return the old state', async () => {
        const first = await BackendRegistry.build(
            [{ name: 'pdf', location: 'PDF' }],
            async (name) => fakeBackend(name),
            silentLogger
        );
        const second = await BackendRegistry.build(
            [{ name: 'pptx', location: 'pptx' }],
            async (name) => fakeBackend(name),
            silentLogger
        );
        const holder = new RegistryHolder(first);

        const previous = holder.swap(second);

        expect(previous).toBe(first);
        expect(holder.current()).toBe(second.registry);
        expect(holder.snapshot()).toBe(second);
    });

    it('should accept a bare registry', () => {
        const registry = new BackendRegistry([fakeBackend('pdf')]);
        const holder = new RegistryHolder(registry);

        expect(holder.current()).toBe(registry);
        expect(holder.snapshot().results).toEqual([]);
    });
});
