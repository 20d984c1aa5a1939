import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createCdnEntity } from '../../entities/EntityDescriptor';
import { PipelineCoordinator } from '../PipelineCoordinator';
import { CycleSummary, DownloadError, DownloadedObject, ListingError } from '../types';
import { InMemoryObjectStore, minutes, NOW, objectAged, StaticOracle, waitFor } from './helpers';

describe('PipelineCoordinator', () => {
  const entity = createCdnEntity({ bucket: 'cdn-logs', prefix: 'cflogs', distributionId: 'EDFDVBD6EXAMPLE' });
  let tempDir: string;
  let store: InMemoryObjectStore;
  let coordinator: PipelineCoordinator;

  const createCoordinator = (oracle = new StaticOracle()) =>
    new PipelineCoordinator(store, oracle, entity, {
      pollIntervalMs: minutes(5),
      backfillWindowMs: minutes(60),
      tempDirectory: tempDir,
      now: () => NOW,
    });

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pipeline-coordinator-test-'));
    store = new InMemoryObjectStore();
  });

  afterEach(async () => {
    await coordinator.stop();
    jest.restoreAllMocks();
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  it('should deliver downloaded objects on the output channel', async () => {
    store.pages = [[objectAged('cflogs/EDFDVBD6EXAMPLE.2024-03-05-11.abcd.gz', minutes(7))]];
    store.bodies.set('cflogs/EDFDVBD6EXAMPLE.2024-03-05-11.abcd.gz', 'log body');
    coordinator = createCoordinator();

    const output = coordinator.start();
    const first = await output.receive();

    expect(first.done).toBe(false);
    const downloaded: DownloadedObject = first.value;
    expect(downloaded.key).toBe('cflogs/EDFDVBD6EXAMPLE.2024-03-05-11.abcd.gz');
    await expect(fs.promises.readFile(downloaded.path, 'utf8')).resolves.toBe('log body');
  });

  it('should skip processed and expired objects', async () => {
    store.pages = [[
      objectAged('recent', minutes(1)),
      objectAged('processed', minutes(30)),
      objectAged('unseen-but-old', minutes(120)),
    ]];
    store.bodies.set('recent', 'r');
    const summaries: CycleSummary[] = [];
    coordinator = createCoordinator(new StaticOracle(['processed']));
    coordinator.on('cycleComplete', (summary: CycleSummary) => summaries.push(summary));

    const output = coordinator.start();
    const first = await output.receive();
    await waitFor(() => summaries.length === 1);

    expect(first.value.key).toBe('recent');
    expect(summaries[0]).toMatchObject({ forwarded: 1, stoppedAt: 'processed' });
  });

  it('should report failed downloads and keep going', async () => {
    store.pages = [[objectAged('missing', minutes(1)), objectAged('present', minutes(2))]];
    store.bodies.set('present', 'p');
    const errors: DownloadError[] = [];
    coordinator = createCoordinator();
    coordinator.on('downloadError', (error: DownloadError) => errors.push(error));

    const output = coordinator.start();
    const first = await output.receive();

    expect(first.value.key).toBe('present');
    expect(errors.map(error => error.key)).toEqual(['missing']);
  });

  it('should close the output with the listing error', async () => {
    store.listError = new Error('NoSuchBucket');
    coordinator = createCoordinator();

    const consume = async () => {
      for await (const downloaded of coordinator.start()) {
        throw new Error(`unexpected object ${downloaded.key}`);
      }
    };

    await expect(consume()).rejects.toBeInstanceOf(ListingError);
    expect(coordinator.isRunning).toBe(false);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('should shut down and remove unclaimed files when the consumer stops reading', async () => {
    store.pages = [[objectAged('newest', minutes(1)), objectAged('older', minutes(2))]];
    store.bodies.set('newest', 'n');
    store.bodies.set('older', 'o');
    coordinator = createCoordinator();

    let kept: DownloadedObject | undefined;
    for await (const downloaded of coordinator.start()) {
      kept = downloaded;
      break;
    }
    await coordinator.stop();

    expect(kept?.key).toBe('newest');
    expect(coordinator.isRunning).toBe(false);
    await expect(fs.promises.readdir(tempDir)).resolves.toEqual([path.basename(kept?.path ?? '')]);
  });

  it('should end the output iteration when stopped', async () => {
    coordinator = createCoordinator();
    const output = coordinator.start();
    const next = output.receive();

    await coordinator.stop();

    await expect(next).resolves.toEqual({ value: undefined, done: true });
    expect(coordinator.isRunning).toBe(false);
  });

  it('should refuse to start twice', () => {
    coordinator = createCoordinator();
    coordinator.start();

    expect(() => coordinator.start()).toThrow('Pipeline for EDFDVBD6EXAMPLE has already been started');
  });
});
