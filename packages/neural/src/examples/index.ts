/**
 * Built-in logic-gate datasets
 */

export type ExampleName = 'and' | 'or' | 'xor';

export interface Example {
  name: ExampleName;
  description: string;
  inputs: number[][];
  targets: number[][];
  /** Layer sizes known to learn this gate */
  recommendedArchitecture: number[];
  recommendedEpochs: number;
  recommendedLearningRate: number;
}

const TRUTH_TABLE_INPUTS = [
  [0, 0],
  [0, 1],
  [1, 0],
  [1, 1],
];

const EXAMPLES: Record<ExampleName, Omit<Example, 'inputs'>> = {
  and: {
    name: 'and',
    description:
      'Logical AND gate - outputs 1 only when both inputs are 1. This is a linearly separable problem.',
    targets: [[0], [0], [0], [1]],
    recommendedArchitecture: [2, 2, 1],
    recommendedEpochs: 5000,
    recommendedLearningRate: 0.5,
  },
  or: {
    name: 'or',
    description:
      'Logical OR gate - outputs 1 when at least one input is 1. This is a linearly separable problem.',
    targets: [[0], [1], [1], [1]],
    recommendedArchitecture: [2, 2, 1],
    recommendedEpochs: 5000,
    recommendedLearningRate: 0.5,
  },
  xor: {
    name: 'xor',
    description:
      'Logical XOR gate - outputs 1 when inputs are different. This is NOT linearly separable and requires a hidden layer.',
    targets: [[0], [1], [1], [0]],
    recommendedArchitecture: [2, 3, 1],
    recommendedEpochs: 10000,
    recommendedLearningRate: 0.5,
  },
};

export const EXAMPLE_NAMES: readonly ExampleName[] = ['and', 'or', 'xor'];

export function isExampleName(name: string): name is ExampleName {
  return Object.prototype.hasOwnProperty.call(EXAMPLES, name);
}

/**
 * Look up an example by name (case-insensitive). Returns fresh arrays on
 * every call.
 */
export function getExample(name: string): Example | undefined {
  const key = name.toLowerCase();
  if (!isExampleName(key)) return undefined;
  const example = EXAMPLES[key];
  return {
    ...example,
    inputs: TRUTH_TABLE_INPUTS.map((row) => [...row]),
    targets: example.targets.map((row) => [...row]),
    recommendedArchitecture: [...example.recommendedArchitecture],
  };
}

export function listExamples(): Example[] {
  const examples: Example[] = [];
  for (const name of EXAMPLE_NAMES) {
    const example = getExample(name);
    if (example) examples.push(example);
  }
  return examples;
}
