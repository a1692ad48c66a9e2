export class FuturesValidationError extends Error {
  constructor(message: string, public readonly symbol: string) {
    super(message);
    this.name = "FuturesValidationError";
  }
}

export class QtyOutOfRangeError extends FuturesValidationError {
  constructor(symbol: string, message = `Quantity out of range for ${symbol}`) {
    super(message, symbol);
    this.name = "QtyOutOfRangeError";
  }
}

export class LeverageOutOfRangeError extends FuturesValidationError {
  constructor(symbol: string, message = `Leverage out of range for ${symbol}`) {
    super(message, symbol);
    this.name = "LeverageOutOfRangeError";
  }
}
