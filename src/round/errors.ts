import ClientError from "../http/api/clientError.js";

export class RoundError extends ClientError {
  constructor(message: string, status = 400) {
    super(message, status);
  }
}

export class UnauthorizedError extends RoundError {
  constructor() {
    super("Unauthorized", 403);
  }
}

export class RoundNotFoundError extends RoundError {
  constructor(roundId: string) {
    super(`Round ${roundId} not found`, 404);
  }
}

export class RoundAlreadyExistsError extends RoundError {
  constructor(roundId: string) {
    super(`Round ${roundId} already exists`, 409);
  }
}

export class ProposalNotFoundError extends RoundError {
  constructor(proposalId: number) {
    super(`Proposal ${proposalId} not found`, 404);
  }
}

export class ProposalPeriodExpiredError extends RoundError {
  constructor() {
    super("Proposal period expired", 409);
  }
}

export class VotingPeriodExpiredError extends RoundError {
  constructor() {
    super("Voting period expired", 409);
  }
}

export class VotingPeriodNotExpiredError extends RoundError {
  constructor() {
    super("Voting period not expired", 409);
  }
}

export class InvalidPeriodError extends RoundError {
  constructor(message: string) {
    super(message);
  }
}

export class AddressAlreadyVotedError extends RoundError {
  constructor(proposalId: number) {
    super(`Address already voted on proposal ${proposalId}`, 409);
  }
}

export class RoundAlreadyDistributedError extends RoundError {
  constructor(roundId: string) {
    super(`Round ${roundId} has already been distributed`, 409);
  }
}

export class NoFundsError extends RoundError {
  constructor() {
    super("No funds sent");
  }
}

export class MultipleDenomsError extends RoundError {
  constructor() {
    super("Sent more than one denomination");
  }
}

export class WrongDenomError extends RoundError {
  constructor(expected: string, got: string) {
    super(`Expected funds in ${expected}, got ${got}`);
  }
}

export class DistributionNotFoundError extends RoundError {
  constructor(roundId: string) {
    super(`Round ${roundId} has not been distributed`, 404);
  }
}
