import ClientError from "../http/api/clientError.js";

export class CalculatorError extends ClientError {
  constructor(message: string, status = 400) {
    super(message, status);
  }
}

export class ArithmeticOverflowError extends CalculatorError {
  constructor(operation: string) {
    super(`arithmetic overflow in ${operation}`, 422);
  }
}

export class UnsupportedAlgorithmError extends CalculatorError {
  constructor(algorithm: string) {
    super(`unsupported matching algorithm: ${algorithm}`);
  }
}

export class InvalidInputError extends CalculatorError {
  constructor(message: string) {
    super(message, 422);
  }
}
