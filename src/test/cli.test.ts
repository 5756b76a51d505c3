import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createProgram, parseInteger } from '../cli';

const mockQdrant = {
    getCollections: jest.fn(),
    createCollection: jest.fn(),
    upsert: jest.fn(),
    delete: jest.fn(),
    retrieve: jest.fn()
};

const mockOpenAI = {
    embeddings: {
        create: jest.fn()
    }
};

jest.mock('@qdrant/js-client-rest', () => ({
    QdrantClient: jest.fn(() => mockQdrant)
}));

jest.mock('openai', () => ({
    __esModule: true,
    default: jest.fn(() => mockOpenAI)
}));

describe('rag-sync CLI', () => {
    let tempDir: string;
    let configPath: string;
    let output: string[];

    async function runCli(...args: string[]): Promise<void> {
        const program = createProgram(text => output.push(text));
        program.exitOverride();
        await program.parseAsync(['node', 'rag-sync', ...args]);
    }

    async function writeConfig(overrides: Record<string, unknown> = {}): Promise<void> {
        await fs.writeFile(configPath, JSON.stringify({
            source: { type: 'filesystem', rootPath: path.join(tempDir, 'docs') },
            state: { path: path.join(tempDir, 'state', 'sync.json') },
            chunking: { chunkSize: 100, chunkOverlap: 10, minChunkSize: 1 },
            embedding: { apiKey: 'test-secret' },
            vectorStore: { dimension: 3 },
            ...overrides
        }));
    }

    function lastOutput(): unknown {
        return JSON.parse(output[output.length - 1] ?? 'null');
    }

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rag-sync-cli-'));
        configPath = path.join(tempDir, 'sync.json');
        output = [];
        process.exitCode = undefined;

        await fs.mkdir(path.join(tempDir, 'docs'));
        await fs.writeFile(path.join(tempDir, 'docs', 'a.txt'), 'alpha');
        await fs.writeFile(path.join(tempDir, 'docs', 'b.md'), '# Bravo\n\nbody');
        await writeConfig();

        mockQdrant.getCollections.mockResolvedValue({ collections: [{ name: 'documents' }] });
        mockQdrant.upsert.mockResolvedValue({ status: 'completed' });
        mockQdrant.delete.mockResolvedValue({ status: 'completed' });
        mockOpenAI.embeddings.create.mockImplementation(async ({ input }: { input: string[] }) => ({
            data: input.map((_, index) => ({ index, embedding: [1, 0, 0] }))
        }));
    });

    afterEach(async () => {
        process.exitCode = undefined;
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should run a cycle and print its report', async () => {
        await runCli('sync', '--config', configPath);

        expect(lastOutput()).toMatchObject({ status: 'completed', added: ['a.txt', 'b.md'], chunksWritten: 2 });
        expect(process.exitCode).toBe(0);
        expect(mockQdrant.upsert).toHaveBeenCalledTimes(2);
    });

    it('should summarize the stored state', async () => {
        await runCli('sync', '--config', configPath);

        await runCli('status', '--config', configPath);

        expect(lastOutput()).toMatchObject({
            statePath: path.join(tempDir, 'state', 'sync.json'),
            documents: 2,
            chunks: 2
        });
        expect(process.exitCode).toBe(0);
    });

    async function holdLock(): Promise<void> {
        await fs.mkdir(path.join(tempDir, 'state'), { recursive: true });
        await fs.writeFile(path.join(tempDir, 'state', 'sync.json.lock'), JSON.stringify({
            pid: process.pid,
            hostname: os.hostname(),
            cycleId: 'running-cycle',
            acquiredAt: new Date().toISOString()
        }));
    }

    it('should forget a record and its chunks so the next cycle adds it again', async () => {
        await runCli('sync', '--config', configPath);
        const state = JSON.parse(await fs.readFile(path.join(tempDir, 'state', 'sync.json'), 'utf-8'));
        const chunkIds: string[] = state.records['a.txt'].chunkIds;
        expect(chunkIds).toHaveLength(1);
        mockQdrant.delete.mockClear();

        await runCli('forget', 'a.txt', '--config', configPath);
        expect(lastOutput()).toEqual({ documentId: 'a.txt', removed: true, chunksDeleted: 1 });
        expect(mockQdrant.delete).toHaveBeenCalledWith('documents', { wait: true, points: chunkIds });

        await runCli('sync', '--config', configPath);
        expect(lastOutput()).toMatchObject({ added: ['a.txt'], unchanged: 1 });
    });

    it('should exit with 1 when forgetting an unknown id', async () => {
        await runCli('forget', 'missing.txt', '--config', configPath);

        expect(lastOutput()).toEqual({ documentId: 'missing.txt', removed: false, chunksDeleted: 0 });
        expect(process.exitCode).toBe(1);
        expect(mockQdrant.delete).not.toHaveBeenCalled();
    });

    it('should not forget while a cycle holds the state lock', async () => {
        await runCli('sync', '--config', configPath);
        mockQdrant.delete.mockClear();
        output = [];
        await holdLock();

        await runCli('forget', 'a.txt', '--config', configPath);

        expect(output).toEqual([]);
        expect(process.exitCode).toBe(2);
        expect(mockQdrant.delete).not.toHaveBeenCalled();
        const state = JSON.parse(await fs.readFile(path.join(tempDir, 'state', 'sync.json'), 'utf-8'));
        expect(Object.keys(state.records).sort()).toEqual(['a.txt', 'b.md']);
    });

    it('should exit with 2 on invalid configuration', async () => {
        await writeConfig({ embedding: {} });

        await runCli('sync', '--config', configPath);

        expect(output).toEqual([]);
        expect(process.exitCode).toBe(2);
    });

    it('should allow status without embedding credentials', async () => {
        await writeConfig({ embedding: {} });

        await runCli('status', '--config', configPath);

        expect(lastOutput()).toMatchObject({ documents: 0, chunks: 0, updatedAt: null });
    });

    it('should abort on a corrupted state file unless asked to reset it', async () => {
        await fs.mkdir(path.join(tempDir, 'state'));
        await fs.writeFile(path.join(tempDir, 'state', 'sync.json'), 'garbage');

        await runCli('sync', '--config', configPath);
        expect(lastOutput()).toMatchObject({ status: 'aborted', error: { code: 'STATE_CORRUPTED' } });
        expect(process.exitCode).toBe(2);

        await runCli('sync', '--config', configPath, '--reset-state');
        expect(lastOutput()).toMatchObject({ status: 'completed', added: ['a.txt', 'b.md'] });

        const stateFiles = await fs.readdir(path.join(tempDir, 'state'));
        expect(stateFiles.filter(name => name.startsWith('sync.json.corrupt-'))).toHaveLength(1);
    });

    it('should not move a corrupted state file aside while a cycle holds the lock', async () => {
        await holdLock();
        await fs.writeFile(path.join(tempDir, 'state', 'sync.json'), 'garbage');

        await runCli('sync', '--config', configPath, '--reset-state');

        expect(output).toEqual([]);
        expect(process.exitCode).toBe(2);
        expect(await fs.readFile(path.join(tempDir, 'state', 'sync.json'), 'utf-8')).toBe('garbage');
    });

    it('should apply command line overrides', async () => {
        await runCli('sync', '--config', configPath, '--concurrency', '1', '--timeout', '0');

        expect(lastOutput()).toMatchObject({ status: 'completed', timedOut: false });
    });
});

describe('parseInteger', () => {
    it('should parse non-negative integers', () => {
        expect(parseInteger('42')).toBe(42);
        expect(parseInteger('0')).toBe(0);
    });

    it('should reject anything else', () => {
        expect(() => parseInteger('-1')).toThrow('Expected a non-negative integer.');
        expect(() => parseInteger('1.5')).toThrow('Expected a non-negative integer.');
        expect(() => parseInteger('abc')).toThrow('Expected a non-negative integer.');
    });
});
