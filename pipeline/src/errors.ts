export class MalformedInputError extends Error {
  constructor(
    message: string,
    readonly source?: string,
    readonly line?: number,
  ) {
    super(
      source === undefined
        ? message
        : `${source}${line === undefined ? "" : `:${line}`}: ${message}`,
    );
    this.name = "MalformedInputError";
  }
}

export class AggregationOverflowError extends Error {
  constructor(
    readonly pair: string,
    readonly field: string,
    readonly value: number,
  ) {
    super(`Accumulator ${field} overflowed for pair ${pair}: ${value}`);
    this.name = "AggregationOverflowError";
  }
}

// Raised by catalog lookups; callers that display names decide how to degrade.
export class UnknownItemError extends Error {
  constructor(readonly itemId: number) {
    super(`Unknown item id: ${itemId}`);
    this.name = "UnknownItemError";
  }
}
