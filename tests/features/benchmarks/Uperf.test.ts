import fs from 'fs';
import os from 'os';
import path from 'path';
import { Uperf, UperfParseError } from '../../../src/features/benchmarks/Uperf';
import { TOOLS } from '../../../src/registry';
import type { ProcessSample } from '../../../src/ports/process/ProcessRunnerPort';
import { FakeLogger } from '../../helpers/FakeLogger';

const STREAM_OUTPUT = [
  'Starting 1 threads running profile:stream-tcp-16384-16384-1 ...   0.00 seconds',
  'timestamp_ms:1700000000000.000 name:Txn2 nr_bytes:0 nr_ops:0',
  'timestamp_ms:1700000001000.000 name:Txn2 nr_bytes:1000000 nr_ops:500',
  'timestamp_ms:1700000002500.000 name:Txn2 nr_bytes:2500000 nr_ops:1250',
  'Txn2 done',
].join('\n');

const IDLE_OUTPUT = [
  'Starting 4 threads running profile:rr-udp-64-1024-4 ...   0.00 seconds',
  'timestamp_ms:1700000000000.000 name:Txn2 nr_bytes:0 nr_ops:0',
  'timestamp_ms:1700000001000.000 name:Txn2 nr_bytes:0 nr_ops:0',
].join('\n');

function processSample(overrides: Partial<ProcessSample>): ProcessSample {
  return {
    command: 'uperf -v -a -R -i 1 -m /tmp/w.xml',
    success: true,
    attempts: 1,
    expectedRc: 0,
    rc: 0,
    stdout: '',
    stderr: '',
    timeSeconds: 1,
    hostname: 'client-0',
    ...overrides,
  };
}

function makeUperf() {
  const logger = new FakeLogger();
  const runner = { run: jest.fn<Promise<ProcessSample>, [string, string[], object?]>() };
  const uperf = new Uperf({ runner, logger });
  return { uperf, logger, runner };
}

describe('Uperf', () => {
  let tempDir: string;
  let workload: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'uperf-test-'));
    workload = path.join(tempDir, 'stream.xml');
    fs.writeFileSync(workload, '<profile name="stream-tcp-16384-16384-1"/>');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  test('registers itself as the "uperf" tool', () => {
    expect(Uperf.toolName).toBe('uperf');
    expect(TOOLS.lookup('uperf')).toBe(Uperf);
  });

  describe('arguments', () => {
    test('defaults match the operator conventions', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs([], {});
      expect(uperf.config).toMatchObject({
        sample: 1,
        ips: '',
        remoteip: '',
        hostnetwork: 'False',
        serviceip: 'False',
        pod_id: '',
      });
      expect(uperf.config.workload).toBeUndefined();
      expect(uperf.config.uuid).toBeUndefined();
    });

    test('binds the operator environment variables', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs([], {
        WORKLOAD: workload,
        SAMPLE: '3',
        UUID: 'run-42',
        USER: 'perf',
        clustername: 'lab-a',
        my_pod_idx: '2',
        h: '10.0.0.7',
      });
      expect(uperf.config).toMatchObject({
        workload,
        sample: 3,
        uuid: 'run-42',
        user: 'perf',
        cluster_name: 'lab-a',
        pod_id: '2',
        remoteip: '10.0.0.7',
      });
    });

    test('requires workload, uuid and user', () => {
      const { uperf } = makeUperf();
      expect(Array.from(uperf.requiredArgs)).toEqual(['workload', 'uuid', 'user']);
    });
  });

  describe('preflightChecks', () => {
    test('passes with every required argument and a readable workload', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs(['-w', workload, '-u', 'run-1', '--user', 'perf'], {});
      expect(uperf.preflightChecks()).toBe(true);
    });

    test('reports missing arguments and the missing workload together', () => {
      const { uperf, logger } = makeUperf();
      const missing = path.join(tempDir, 'absent.xml');
      uperf.parseArgs(['-w', missing], {});
      expect(uperf.preflightChecks()).toBe(false);
      expect(logger.messages('error')).toEqual([
        'Missing required argument "uuid"',
        'Missing required argument "user"',
        `File not found: ${missing}`,
      ]);
    });
  });

  describe('run', () => {
    test('runs uperf once per sample with retries and collects stdout', async () => {
      const { uperf, runner } = makeUperf();
      runner.run
        .mockResolvedValueOnce(processSample({ stdout: 'first' }))
        .mockResolvedValueOnce(processSample({ stdout: 'second' }));
      uperf.parseArgs(['-w', workload, '-s', '2', '-u', 'run-1', '--user', 'perf'], {});

      const result = await uperf.run();

      expect(result).toEqual({ ok: true, samples: ['first', 'second'] });
      expect(runner.run).toHaveBeenCalledTimes(2);
      expect(runner.run).toHaveBeenCalledWith(
        'uperf',
        ['-v', '-a', '-R', '-i', '1', '-m', workload],
        { retries: 2, expectedRc: 0 }
      );
    });

    test('stops at the first failed sample and keeps earlier ones', async () => {
      const { uperf, runner, logger } = makeUperf();
      runner.run
        .mockResolvedValueOnce(processSample({ stdout: 'first' }))
        .mockResolvedValueOnce(processSample({ success: false, rc: 1, attempts: 3, stderr: 'connection refused' }));
      uperf.parseArgs(['-w', workload, '-s', '3', '-u', 'run-1', '--user', 'perf'], {});

      const result = await uperf.run();

      expect(result).toEqual({ ok: false, samples: ['first'] });
      expect(runner.run).toHaveBeenCalledTimes(2);
      expect(logger.logs).toContainEqual({
        level: 'error',
        message: 'Uperf failed to run!',
        meta: { sample: 2, rc: 1, attempts: 3, stderr: 'connection refused' },
      });
    });

    test('does nothing without a workload', async () => {
      const { uperf, runner } = makeUperf();
      uperf.parseArgs([], {});
      await expect(uperf.run()).resolves.toEqual({ ok: false, samples: [] });
      expect(runner.run).not.toHaveBeenCalled();
    });
  });

  describe('parseStdout', () => {
    test('extracts the profile and every Txn2 row', () => {
      const parsed = Uperf.parseStdout(STREAM_OUTPUT);
      expect(parsed.results).toEqual([
        ['1700000000000.000', '0', '0'],
        ['1700000001000.000', '1000000', '500'],
        ['1700000002500.000', '2500000', '1250'],
      ]);
      expect(parsed.config).toEqual({
        test_type: 'stream',
        protocol: 'tcp',
        message_size: 16384,
        read_message_size: 16384,
        num_threads: 1,
        duration: 3,
      });
    });

    test('keeps write and read sizes apart', () => {
      const { config } = Uperf.parseStdout(IDLE_OUTPUT);
      expect(config.message_size).toBe(64);
      expect(config.read_message_size).toBe(1024);
      expect(config.num_threads).toBe(4);
    });

    test('fails without a profile line', () => {
      expect(() => Uperf.parseStdout('timestamp_ms:1 name:Txn2 nr_bytes:0 nr_ops:0')).toThrow(UperfParseError);
    });

    test('fails on a profile name with the wrong shape', () => {
      expect(() => Uperf.parseStdout('running profile:stream-tcp-64 ...')).toThrow(
        'Profile "stream-tcp-64" does not match <test>-<protocol>-<wsize>-<rsize>-<nthr>.'
      );
    });

    test('fails on non-numeric sizes', () => {
      expect(() => Uperf.parseStdout('running profile:stream-tcp-big-64-1 ...')).toThrow(
        'Profile "stream-tcp-big-64-1" has a non-numeric write size: "big".'
      );
    });
  });

  describe('emitMetrics', () => {
    test('emits one document per interval after the first row', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs(['-w', workload, '-u', 'run-1', '--user', 'perf', '--cluster-name', 'lab-a'], {});

      const docs = uperf.emitMetrics([STREAM_OUTPUT]);

      expect(docs).toHaveLength(2);
      expect(docs[0]).toMatchObject({
        uuid: 'run-1',
        user: 'perf',
        cluster_name: 'lab-a',
        resourcetype: null,
        hostnetwork: 'False',
        test_type: 'stream',
        protocol: 'tcp',
        message_size: 16384,
        read_message_size: 16384,
        num_threads: 1,
        duration: 3,
        iteration: 1,
        kind: 'result',
        timestamp: '2023-11-14T22:13:21.000Z',
        bytes: 1000000,
        norm_byte: 1000000,
        ops: 500,
        norm_ops: 500,
        norm_ltcy: 2000,
      });
      expect(docs[1]).toMatchObject({
        timestamp: '2023-11-14T22:13:22.500Z',
        bytes: 2500000,
        norm_byte: 1500000,
        ops: 1250,
        norm_ops: 750,
        norm_ltcy: 2000,
      });
    });

    test('leaves run-only arguments out of the documents', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs(['-w', workload, '-u', 'run-1', '--user', 'perf'], {});
      const [doc] = uperf.emitMetrics([STREAM_OUTPUT]);
      expect(doc).not.toHaveProperty('workload');
      expect(doc).not.toHaveProperty('sample');
    });

    test('numbers iterations by sample', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs(['-u', 'run-1', '--user', 'perf'], {});
      const docs = uperf.emitMetrics([STREAM_OUTPUT, STREAM_OUTPUT]);
      expect(docs.map((doc) => doc.iteration)).toEqual([1, 1, 2, 2]);
    });

    test('reports null latency for intervals without operations', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs([], {});
      const docs = uperf.emitMetrics([IDLE_OUTPUT]);
      expect(docs).toHaveLength(1);
      expect(docs[0]).toMatchObject({ protocol: 'udp', norm_ops: 0, norm_byte: 0, norm_ltcy: null });
    });

    test('a sample with a single row yields no documents', () => {
      const { uperf } = makeUperf();
      uperf.parseArgs([], {});
      const single = 'running profile:stream-tcp-64-64-1 ...\ntimestamp_ms:1700000000000.000 name:Txn2 nr_bytes:0 nr_ops:0';
      expect(uperf.emitMetrics([single])).toEqual([]);
    });
  });
});
