// SPDX-License-Identifier: Apache-2.0

export type ShuffleErrorKind = "InvalidParameter" | "ShapeMismatch";

export abstract class ShuffleError extends Error {
  abstract readonly kind: ShuffleErrorKind;
}

/** A caller-supplied parameter is outside its domain. */
export class InvalidParameterError extends ShuffleError {
  readonly kind = "InvalidParameter";

  constructor(message: string) {
    super(message);
    this.name = "InvalidParameterError";
  }
}

/**
 * A shuffle produced something other than a permutation of the sequence
 * it was given.
 */
export class ShapeMismatchError extends ShuffleError {
  readonly kind = "ShapeMismatch";
  readonly expected: number;
  readonly actual: number;

  constructor(message: string, expected: number, actual: number) {
    super(message);
    this.name = "ShapeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}
