/**
 * Contract checks. A failed check is a caller bug and is never caught
 * inside the library.
 */

export class ContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class PreconditionError extends ContractError {}

export class PostconditionError extends ContractError {}

export function requires(condition: boolean, message: string): asserts condition {
  if (!condition) throw new PreconditionError(message);
}

export function ensures(condition: boolean, message: string): asserts condition {
  if (!condition) throw new PostconditionError(message);
}
