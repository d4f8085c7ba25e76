import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan applied when the task collection is first opened:
 * - unique: { timestamp: 1 } backs the conditional upsert in `markRunning`
 * - { status: 1, timestamp: 1 } serves `listIncomplete`
 */
export const mongoIndexes: {
  taskCollection: { keys: IndexSpecification; options: CreateIndexesOptions }[];
} = {
  taskCollection: [
    { keys: { timestamp: 1 }, options: { unique: true } },
    { keys: { status: 1, timestamp: 1 }, options: {} }
  ]
};
