/**
 * Every rejected entry point throws exactly one of these. Callers branch on
 * `code`; the class groups codes by cause.
 */
export abstract class ProtocolError<C extends string = string> extends Error {
  abstract readonly kind: string;

  constructor(
    readonly code: C,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthorizationError extends ProtocolError<
  "NotAdmin" | "NotProvider" | "NotOracle"
> {
  readonly kind = "authorization";
}

export class PausedError extends ProtocolError<"Paused"> {
  readonly kind = "paused";

  constructor() {
    super("Paused", "protocol is paused");
  }
}

export class LifecycleError extends ProtocolError<
  "InvalidBatch" | "InvalidBatchState" | "UnknownRequest" | "RequestIdReused"
> {
  readonly kind = "lifecycle";
}

export class RateLimitError extends ProtocolError<"CooldownActive"> {
  readonly kind = "rate-limit";

  constructor(readonly retryAt: bigint) {
    super("CooldownActive", `cooldown active until ${retryAt}`);
  }
}

export class DuplicateError extends ProtocolError<"DuplicateContribution"> {
  readonly kind = "duplicate";
}

export class ReplayError extends ProtocolError<"ReplayAttempt"> {
  readonly kind = "replay";
}

export class ConsistencyError extends ProtocolError<"StateMismatch"> {
  readonly kind = "consistency";
}

export class ProofError extends ProtocolError<
  "ProofVerificationFailed" | "MalformedCleartexts"
> {
  readonly kind = "proof";
}

export class PayloadError extends ProtocolError<"MalformedPayload"> {
  readonly kind = "payload";
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}
