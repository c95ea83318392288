/**
 * ModelStore - in-memory registry of networks trained through the API
 */

import { v4 as uuidv4 } from 'uuid';
import type { Network } from '@logic-net/neural';

export interface StoredModel {
  id: string;
  network: Network;
  example: string;
  epochs: number;
  learningRate: number;
  finalLoss: number;
  accuracy: number;
  createdAt: Date;
}

export type NewModel = Omit<StoredModel, 'id' | 'createdAt'>;

export class ModelStore {
  private models: Map<string, StoredModel> = new Map();

  add(model: NewModel): StoredModel {
    const stored: StoredModel = { ...model, id: uuidv4(), createdAt: new Date() };
    this.models.set(stored.id, stored);
    return stored;
  }

  get(id: string): StoredModel | undefined {
    return this.models.get(id);
  }

  has(id: string): boolean {
    return this.models.has(id);
  }

  get size(): number {
    return this.models.size;
  }
}
