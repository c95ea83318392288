import type { LoadedNetworkFile } from '@logic-net/neural';

export interface NetworkFileSummary {
  kind: LoadedNetworkFile['kind'];
  version: string;
  example: string;
  /** Epochs trained so far */
  epochs: number;
  /** Target epoch count, checkpoints only */
  totalEpochs?: number;
  learningRate: number;
  architecture: number[];
  parameters: number;
  /** Creation time recorded in the file */
  created: string;
  finalLoss?: number;
  finalAccuracy?: number;
}

export function summarizeNetworkFile(loaded: LoadedNetworkFile): NetworkFileSummary {
  const { network } = loaded;
  const common = {
    kind: loaded.kind,
    learningRate: network.learningRate,
    architecture: [...network.architecture],
    parameters: network.parameterCount(),
  };

  if (loaded.kind === 'checkpoint') {
    const { metadata } = loaded.document;
    return {
      ...common,
      version: metadata.version,
      example: metadata.example,
      epochs: metadata.epoch,
      totalEpochs: metadata.total_epochs,
      created: metadata.timestamp,
    };
  }

  const { version, model } = loaded.document;
  return {
    ...common,
    version,
    example: model.example,
    epochs: model.trained_epochs,
    created: model.created,
    finalLoss: model.final_loss,
    finalAccuracy: model.final_accuracy,
  };
}
