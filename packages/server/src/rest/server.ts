import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';
import cors from '@fastify/cors';
import type { ServerResponse } from 'node:http';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import {
  Network,
  SIGMOID,
  TrainingController,
  createSeededRandom,
  getExample,
  listExamples,
  toModelFile,
  type Example,
  type TrainingCallback,
} from '@logic-net/neural';
import type { ServerConfig } from '../config/types.js';
import type { ModelStore, StoredModel } from '../models/ModelStore.js';
import type { Logger } from '../utils/logger.js';
import { ApiError, toApiError } from './errors.js';
import { evalRequestSchema, trainRequestSchema } from './schemas.js';

interface TrainingPlan {
  example: Example;
  epochs: number;
  learningRate: number;
  seed?: number;
}

interface TrainResponse {
  model_id: string;
  example: string;
  epochs: number;
  final_loss: number;
  accuracy: number;
}

/**
 * REST Server for logic-net
 *
 * Trains the built-in examples on request, keeps the resulting networks in
 * memory and evaluates them. One training session runs at a time.
 */
export class RestServer {
  private server: FastifyInstance;
  private store: ModelStore;
  private logger: Logger;
  private config: ServerConfig;
  private startTime: number;
  private trainingActive = false;

  private static readonly MILLISECONDS_PER_SECOND = 1000;

  constructor(store: ModelStore, logger: Logger, config: ServerConfig) {
    this.store = store;
    this.logger = logger;
    this.config = config;
    this.startTime = Date.now();
    this.server = Fastify({
      logger: false, // We use our own logger
    });

    this.setupRoutes();
  }

  /**
   * Underlying fastify instance, for in-process requests via inject()
   */
  getInstance(): FastifyInstance {
    return this.server;
  }

  /**
   * Setup REST routes
   */
  private setupRoutes(): void {
    if (this.config.cors.enabled) {
      void this.server.register(cors, {
        origin: true,
        methods: ['GET', 'POST'],
      });
    }

    // Health check
    this.server.get('/health', async () => {
      return {
        status: 'ok',
        uptime_seconds: Math.floor((Date.now() - this.startTime) / RestServer.MILLISECONDS_PER_SECOND),
        models: this.store.size,
      };
    });

    // Built-in datasets
    this.server.get('/api/examples', async () => {
      return listExamples().map((example) => ({
        name: example.name,
        description: example.description,
        architecture: example.recommendedArchitecture,
        epochs: example.recommendedEpochs,
        learning_rate: example.recommendedLearningRate,
      }));
    });

    // Train and store a model
    this.server.post('/api/train', async (request, reply) => {
      try {
        const plan = this.planTraining(request.body);
        this.acquireTrainingSlot();
        try {
          const stored = await this.train(plan);
          if (!stored) {
            throw new ApiError('Training was interrupted', 500, 'INTERNAL_ERROR');
          }
          return this.describeTraining(stored);
        } finally {
          this.trainingActive = false;
        }
      } catch (error) {
        return this.sendError(reply, error);
      }
    });

    // Train with progress streamed as server-sent events
    this.server.post('/api/train/stream', async (request, reply) => {
      let plan: TrainingPlan;
      try {
        plan = this.planTraining(request.body);
        this.acquireTrainingSlot();
      } catch (error) {
        return this.sendError(reply, error);
      }

      reply.hijack();
      const raw = reply.raw;
      raw.writeHead(200, {
        ...reply.getHeaders(),
        'content-type': 'text/event-stream',
        'cache-control': 'no-cache',
        connection: 'keep-alive',
      });

      let clientGone = false;
      raw.on('close', () => {
        if (!raw.writableEnded) clientGone = true;
      });

      const interval = this.config.training.progressInterval;
      const progress: TrainingCallback = {
        onEpochEnd: async ({ epoch, totalEpochs, loss }) => {
          if (clientGone) return 'stop';
          if (epoch % interval === 0 || epoch === totalEpochs) {
            this.writeEvent(raw, 'progress', { epoch, loss });
            await yieldToEventLoop();
          }
          return undefined;
        },
      };

      try {
        const stored = await this.train(plan, progress);
        if (stored) {
          this.writeEvent(raw, 'complete', this.describeTraining(stored));
        } else {
          this.logger.info('Stream client disconnected, training stopped');
        }
      } catch (error) {
        const apiError = toApiError(error);
        this.logger.error('Streamed training failed', error);
        this.writeEvent(raw, 'error', { error: apiError.message, code: apiError.code });
      } finally {
        this.trainingActive = false;
        raw.end();
      }
    });

    // Evaluate a stored model
    this.server.post('/api/eval', async (request, reply) => {
      try {
        const parsed = evalRequestSchema.safeParse(request.body);
        if (!parsed.success) {
          throw ApiError.validation(parsed.error);
        }
        const model = this.requireModel(parsed.data.model_id);
        const { input } = parsed.data;
        if (input.length !== model.network.inputSize) {
          throw new ApiError(
            `Invalid input dimensions: expected ${model.network.inputSize}, got ${input.length}`,
            400,
            'VALIDATION_ERROR'
          );
        }
        return { output: model.network.evaluate(input) };
      } catch (error) {
        return this.sendError(reply, error);
      }
    });

    // Model information
    this.server.get<{ Params: { id: string } }>('/api/models/:id', async (request, reply) => {
      try {
        const model = this.requireModel(request.params.id);
        return {
          model_id: model.id,
          example: model.example,
          architecture: model.network.architecture,
          epochs: model.epochs,
          learning_rate: model.learningRate,
          total_parameters: model.network.parameterCount(),
          created_at: model.createdAt.toISOString(),
        };
      } catch (error) {
        return this.sendError(reply, error);
      }
    });

    // Model file download
    this.server.get<{ Params: { id: string } }>('/api/models/:id/export', async (request, reply) => {
      try {
        const model = this.requireModel(request.params.id);
        return toModelFile(model.network, {
          example: model.example,
          trainedEpochs: model.epochs,
          finalLoss: model.finalLoss,
          finalAccuracy: model.accuracy,
          created: model.createdAt.toISOString(),
        });
      } catch (error) {
        return this.sendError(reply, error);
      }
    });
  }

  /**
   * Start the server
   */
  async start(port: number = this.config.server.port, host: string = this.config.server.host): Promise<void> {
    try {
      await this.server.listen({ port, host });
      this.logger.info(`REST server listening on ${host}:${port}`);
    } catch (error) {
      this.logger.error('Failed to start REST server', error);
      throw error;
    }
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    await this.server.close();
    this.logger.info('REST server stopped');
  }

  // ===========================================================================
  // Training
  // ===========================================================================

  private planTraining(body: unknown): TrainingPlan {
    const parsed = trainRequestSchema.safeParse(body);
    if (!parsed.success) {
      throw ApiError.validation(parsed.error);
    }

    const { example: name, epochs, learning_rate: learningRate, seed } = parsed.data;
    const example = getExample(name);
    if (!example) {
      throw new ApiError(`Unknown example: ${name}`, 400, 'UNKNOWN_EXAMPLE');
    }

    const { maxEpochs, defaultLearningRate } = this.config.training;
    if (epochs > maxEpochs) {
      throw new ApiError(`epochs must not exceed ${maxEpochs}, got ${epochs}`, 400, 'VALIDATION_ERROR');
    }

    return { example, epochs, learningRate: learningRate ?? defaultLearningRate, seed };
  }

  private acquireTrainingSlot(): void {
    if (this.trainingActive) {
      throw new ApiError('Another training session is in progress', 409, 'TRAINING_IN_PROGRESS');
    }
    this.trainingActive = true;
  }

  /**
   * Train a fresh network for the plan. Returns null when a callback stopped
   * the run before it finished.
   */
  private async train(plan: TrainingPlan, callback?: TrainingCallback): Promise<StoredModel | null> {
    const { example, epochs, learningRate, seed } = plan;
    const random = seed === undefined ? undefined : createSeededRandom(seed);
    const network = Network.create(example.recommendedArchitecture, SIGMOID, learningRate, { random });

    const controller = new TrainingController(
      network,
      { epochs, exampleName: example.name },
      { logger: this.logger }
    );
    if (callback) {
      controller.addCallback(callback);
    }

    const result = await controller.train(example.inputs, example.targets);
    if (result.status === 'interrupted') {
      return null;
    }

    const stored = this.store.add({
      network,
      example: example.name,
      epochs,
      learningRate,
      finalLoss: result.finalLoss,
      accuracy: network.accuracy(example.inputs, example.targets),
    });
    this.logger.info('Model trained', {
      modelId: stored.id,
      example: stored.example,
      epochs,
      loss: stored.finalLoss,
      durationMs: result.durationMs,
    });
    return stored;
  }

  private describeTraining(model: StoredModel): TrainResponse {
    return {
      model_id: model.id,
      example: model.example,
      epochs: model.epochs,
      final_loss: model.finalLoss,
      accuracy: model.accuracy,
    };
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private requireModel(id: string): StoredModel {
    const model = this.store.get(id);
    if (!model) {
      throw new ApiError('Model not found', 404, 'MODEL_NOT_FOUND');
    }
    return model;
  }

  private writeEvent(raw: ServerResponse, event: string, data: object): void {
    raw.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
  }

  private sendError(reply: FastifyReply, error: unknown): FastifyReply {
    const apiError = toApiError(error);
    if (apiError.statusCode >= 500) {
      this.logger.error('Request failed', error);
    } else {
      this.logger.debug('Request rejected', { code: apiError.code, message: apiError.message });
    }
    return reply.status(apiError.statusCode).send({ error: apiError.message, code: apiError.code });
  }
}
