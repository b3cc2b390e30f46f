/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

/** An operand that is neither a Value of the same graph nor a plain number. */
export class InvalidOperandError extends Data.TaggedError("InvalidOperandError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class AutogradError extends Data.TaggedError("AutogradError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class DatasetError extends Data.TaggedError("DatasetError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class TrainError extends Data.TaggedError("TrainError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class CheckpointError extends Data.TaggedError("CheckpointError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
