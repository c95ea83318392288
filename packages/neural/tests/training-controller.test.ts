/**
 * Training Controller Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { TrainingController } from '../src/training/TrainingController.js';
import type { TrainingProgress, TrainingResult } from '../src/training/types.js';
import { Network } from '../src/network/Network.js';
import { SIGMOID } from '../src/activations/index.js';
import { createSeededRandom } from '../src/matrix/random.js';
import { getExample, type Example } from '../src/examples/index.js';
import { loadCheckpoint } from '../src/checkpoint/codec.js';
import { Logger } from '../src/utils/logger.js';
import {
  CheckpointIoError,
  DimensionMismatchError,
  InvalidTrainingStateError,
  NothingToResumeError,
  TrainingCancelledError,
} from '../src/errors.js';

const silent = new Logger({ level: 'silent', pretty: false });

function andExample(): Example {
  const example = getExample('and');
  if (!example) throw new Error('missing and example');
  return example;
}

function seededNetwork(): Network {
  return Network.create([2, 2, 1], SIGMOID, 0.5, { random: createSeededRandom(7) });
}

describe('TrainingController', () => {
  let dir: string;
  let and: Example;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'logic-net-training-'));
    and = andExample();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  describe('initialization', () => {
    it('should start idle at epoch zero', () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 10 }, { logger: silent });

      expect(controller.state).toBe('idle');
      expect(controller.currentEpoch).toBe(0);
      expect(controller.exampleName).toBe('custom');
    });

    it('should validate the configuration', () => {
      expect(() => new TrainingController(seededNetwork(), { epochs: -1 })).toThrow(
        'Epochs must be a non-negative integer, got -1'
      );
      expect(
        () => new TrainingController(seededNetwork(), { epochs: 10, checkpointInterval: 0 })
      ).toThrow('Checkpoint interval must be a positive integer, got 0');
    });
  });

  describe('callbacks', () => {
    it('should notify every epoch and then end once', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 10 }, { logger: silent });
      const epochs: number[] = [];
      const onTrainingStart = vi.fn();
      const onTrainingEnd = vi.fn();
      controller.addCallback({
        onTrainingStart,
        onEpochEnd: (progress) => {
          epochs.push(progress.epoch);
        },
        onTrainingEnd,
      });

      const result = await controller.train(and.inputs, and.targets);

      expect(epochs).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
      expect(onTrainingStart).toHaveBeenCalledTimes(1);
      expect(onTrainingStart).toHaveBeenCalledWith({ startEpoch: 0, totalEpochs: 10 });
      expect(onTrainingEnd).toHaveBeenCalledTimes(1);
      expect(onTrainingEnd).toHaveBeenCalledWith(result);
      expect(result.status).toBe('completed');
      expect(result.epochsCompleted).toBe(10);
      expect(controller.state).toBe('completed');
    });

    it('should report the epoch loss and a prediction per sample', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 3 }, { logger: silent });
      const progress: TrainingProgress[] = [];
      controller.addCallback({ onEpochEnd: (p) => void progress.push(p) });

      const result = await controller.train(and.inputs, and.targets);

      expect(progress).toHaveLength(3);
      expect(progress[2].totalEpochs).toBe(3);
      expect(progress[2].loss).toBe(result.finalLoss);
      expect(progress[2].predictions).toEqual(and.inputs.map((x) => controller.network.evaluate(x)));
    });

    it('should train exactly like the plain training loop', async () => {
      const reference = seededNetwork();
      const referenceLoss = reference.train(and.inputs, and.targets, 50);
      const controller = new TrainingController(seededNetwork(), { epochs: 50 }, { logger: silent });

      const result = await controller.train(and.inputs, and.targets);

      expect(result.finalLoss).toBe(referenceLoss);
      controller.network.weights.forEach((w, i) => expect(w.equals(reference.weights[i])).toBe(true));
    });

    it('should run callbacks in registration order', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 1 }, { logger: silent });
      const calls: string[] = [];
      controller.addCallback({ onEpochEnd: () => void calls.push('first') });
      controller.addCallback({
        onEpochEnd: async () => {
          await Promise.resolve();
          calls.push('second');
        },
      });
      controller.addCallback({ onEpochEnd: () => void calls.push('third') });

      await controller.train(and.inputs, and.targets);

      expect(calls).toEqual(['first', 'second', 'third']);
    });

    it('should refuse new callbacks once training has started', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 1 }, { logger: silent });
      await controller.train(and.inputs, and.targets);

      expect(() => controller.addCallback({ onEpochEnd: () => undefined })).toThrow(
        InvalidTrainingStateError
      );
      expect(() => controller.addCallback({ onEpochEnd: () => undefined })).toThrow(
        'Cannot add a callback while training controller is completed'
      );
    });
  });

  describe('cancellation', () => {
    it('should stop at the epoch where a callback returns stop', async () => {
      const path = join(dir, 'stop.json');
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 100, checkpointPath: path, exampleName: 'and' },
        { logger: silent }
      );
      const onTrainingEnd = vi.fn<(result: TrainingResult) => void>();
      controller.addCallback({
        onEpochEnd: ({ epoch }) => (epoch === 3 ? 'stop' : undefined),
        onTrainingEnd,
      });

      const result = await controller.train(and.inputs, and.targets);

      expect(result.status).toBe('interrupted');
      expect(result.epochsCompleted).toBe(3);
      expect(result.checkpointsWritten).toBe(1);
      expect(controller.state).toBe('interrupted');
      expect(controller.currentEpoch).toBe(3);
      expect(onTrainingEnd).toHaveBeenCalledTimes(1);

      const checkpoint = await loadCheckpoint(path);
      expect(checkpoint.metadata.epoch).toBe(3);
      expect(checkpoint.metadata.total_epochs).toBe(100);
      expect(checkpoint.metadata.example).toBe('and');
    });

    it('should treat TrainingCancelledError as a stop request and finish the epoch', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 10 }, { logger: silent });
      const seenBySecond: number[] = [];
      controller.addCallback({
        onEpochEnd: ({ epoch }) => {
          if (epoch === 2) throw new TrainingCancelledError('user pressed Ctrl+C');
        },
      });
      controller.addCallback({ onEpochEnd: ({ epoch }) => void seenBySecond.push(epoch) });

      const result = await controller.train(and.inputs, and.targets);

      expect(result.status).toBe('interrupted');
      expect(seenBySecond).toEqual([1, 2]);
      expect(result.checkpointsWritten).toBe(0);
    });

    it('should fail on any other callback error without an end notification', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 10 }, { logger: silent });
      const onTrainingEnd = vi.fn();
      controller.addCallback({
        onEpochEnd: ({ epoch }) => {
          if (epoch === 4) throw new Error('display went away');
        },
        onTrainingEnd,
      });

      await expect(controller.train(and.inputs, and.targets)).rejects.toThrow('display went away');
      expect(controller.state).toBe('failed');
      expect(controller.currentEpoch).toBe(4);
      expect(onTrainingEnd).not.toHaveBeenCalled();
    });
  });

  describe('checkpoints', () => {
    it('should checkpoint on every interval and on the final epoch', async () => {
      const path = join(dir, 'interval.json');
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 10, checkpointInterval: 4, checkpointPath: path },
        { logger: silent }
      );
      const storedAtEpoch5: number[] = [];
      controller.addCallback({
        onEpochEnd: async ({ epoch }) => {
          if (epoch === 5) storedAtEpoch5.push((await loadCheckpoint(path)).metadata.epoch);
        },
      });

      const result = await controller.train(and.inputs, and.targets);

      expect(result.checkpointsWritten).toBe(3);
      expect(storedAtEpoch5).toEqual([4]);
      expect((await loadCheckpoint(path)).metadata.epoch).toBe(10);
    });

    it('should checkpoint only the final epoch without an interval', async () => {
      const path = join(dir, 'final.json');
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 6, checkpointPath: path },
        { logger: silent }
      );

      const result = await controller.train(and.inputs, and.targets);

      expect(result.checkpointsWritten).toBe(1);
      expect((await loadCheckpoint(path)).metadata.epoch).toBe(6);
    });

    it('should write nothing without a destination', async () => {
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 6, checkpointInterval: 2 },
        { logger: silent }
      );

      const result = await controller.train(and.inputs, and.targets);

      expect(result.checkpointsWritten).toBe(0);
    });

    it('should fail when a checkpoint cannot be written', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'not a directory');
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 5, checkpointInterval: 2, checkpointPath: join(blocker, 'ckpt.json') },
        { logger: silent }
      );

      await expect(controller.train(and.inputs, and.targets)).rejects.toBeInstanceOf(CheckpointIoError);
      expect(controller.state).toBe('failed');
      expect(controller.currentEpoch).toBe(2);
    });

    it('should save on demand outside of a run', async () => {
      const path = join(dir, 'manual.json');
      const controller = new TrainingController(seededNetwork(), { epochs: 2 }, { logger: silent });
      await controller.train(and.inputs, and.targets);

      await controller.saveCheckpoint(path);

      expect((await loadCheckpoint(path)).metadata.epoch).toBe(2);
      await expect(controller.saveCheckpoint()).rejects.toBeInstanceOf(CheckpointIoError);
    });
  });

  describe('resume', () => {
    it('should match an uninterrupted run bit for bit', async () => {
      const straight = new TrainingController(seededNetwork(), { epochs: 1000 }, { logger: silent });
      await straight.train(and.inputs, and.targets);

      const path = join(dir, 'resume.json');
      const firstHalf = new TrainingController(
        seededNetwork(),
        { epochs: 500, checkpointPath: path, exampleName: 'and' },
        { logger: silent }
      );
      await firstHalf.train(and.inputs, and.targets);

      const resumed = await TrainingController.resumeFromCheckpoint(path, { epochs: 1000 }, { logger: silent });
      const epochs: number[] = [];
      resumed.addCallback({ onEpochEnd: ({ epoch }) => void epochs.push(epoch) });
      const result = await resumed.train(and.inputs, and.targets);

      expect(resumed.exampleName).toBe('and');
      expect(result.startEpoch).toBe(500);
      expect(result.epochsCompleted).toBe(1000);
      expect(epochs[0]).toBe(501);
      expect(epochs).toHaveLength(500);
      resumed.network.weights.forEach((w, i) =>
        expect(w.equals(straight.network.weights[i])).toBe(true)
      );
      resumed.network.biases.forEach((b, i) =>
        expect(b.equals(straight.network.biases[i])).toBe(true)
      );
    });

    it('should refuse to resume a checkpoint that already reached the target', async () => {
      const path = join(dir, 'done.json');
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 5, checkpointPath: path },
        { logger: silent }
      );
      await controller.train(and.inputs, and.targets);

      await expect(
        TrainingController.resumeFromCheckpoint(path, { epochs: 5 }, { logger: silent })
      ).rejects.toBeInstanceOf(NothingToResumeError);
    });

    it('should continue a completed run with a larger budget', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 5 }, { logger: silent });
      const epochs: number[] = [];
      controller.addCallback({ onEpochEnd: ({ epoch }) => void epochs.push(epoch) });
      await controller.train(and.inputs, and.targets);

      controller.continueTo(8);
      expect(controller.state).toBe('idle');
      await controller.train(and.inputs, and.targets);

      expect(epochs).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
      expect(() => controller.continueTo(8)).toThrow(NothingToResumeError);
    });

    it('should only continue a finished run', () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 5 }, { logger: silent });

      expect(() => controller.continueTo(10)).toThrow(InvalidTrainingStateError);
    });
  });

  describe('state checks', () => {
    it('should reject a second train call', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 1 }, { logger: silent });
      await controller.train(and.inputs, and.targets);

      await expect(controller.train(and.inputs, and.targets)).rejects.toBeInstanceOf(
        InvalidTrainingStateError
      );
    });

    it('should reject mismatched datasets and stay idle', async () => {
      const controller = new TrainingController(seededNetwork(), { epochs: 1 }, { logger: silent });

      await expect(controller.train(and.inputs, and.targets.slice(1))).rejects.toBeInstanceOf(
        DimensionMismatchError
      );
      await expect(controller.train([[0, 0, 0]], [[0]])).rejects.toThrow(
        'Input 0 has length 3, network expects 2'
      );
      expect(controller.state).toBe('idle');
    });

    it('should complete immediately with zero epochs', async () => {
      const network = seededNetwork();
      const controller = new TrainingController(network, { epochs: 0 }, { logger: silent });

      const result = await controller.train(and.inputs, and.targets);

      expect(result.status).toBe('completed');
      expect(result.epochsCompleted).toBe(0);
      expect(result.finalLoss).toBe(network.meanLoss(and.inputs, and.targets));
    });
  });

  describe('verbose logging', () => {
    function epochLines(spy: { mock: { calls: unknown[][] } }): number {
      return spy.mock.calls.filter(([message]) => String(message).startsWith('Epoch ')).length;
    }

    it('should log every epoch for short runs', async () => {
      const info = vi.spyOn(Logger.prototype, 'info').mockImplementation(() => undefined);
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 10, verbose: true },
        { logger: silent }
      );

      await controller.train(and.inputs, and.targets);

      expect(epochLines(info)).toBe(10);
    });

    it('should log about a hundred lines for long runs', async () => {
      const info = vi.spyOn(Logger.prototype, 'info').mockImplementation(() => undefined);
      const controller = new TrainingController(
        seededNetwork(),
        { epochs: 250, verbose: true },
        { logger: silent }
      );

      await controller.train(and.inputs, and.targets);

      expect(epochLines(info)).toBe(125);
    });

    it('should stay quiet unless verbose', async () => {
      const info = vi.spyOn(Logger.prototype, 'info').mockImplementation(() => undefined);
      const controller = new TrainingController(seededNetwork(), { epochs: 10 }, { logger: silent });

      await controller.train(and.inputs, and.targets);

      expect(epochLines(info)).toBe(0);
    });
  });
});
