import { ConflictError } from '../shared/errors.js';

export class AlreadyOwnedError extends ConflictError {
  constructor(name: string, coinId: string) {
    super(`${name} already owns coin ${coinId}`);
  }
}

export class NotCurrentlyOwnedError extends ConflictError {
  constructor(name: string, coinId: string) {
    super(`${name} does not currently own coin ${coinId}`);
  }
}
