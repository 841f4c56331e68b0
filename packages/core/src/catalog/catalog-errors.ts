import { NotFoundError } from '../shared/errors.js';

export class CoinNotFoundError extends NotFoundError {
  readonly coinId: string;

  constructor(coinId: string) {
    super(`Coin not found: ${coinId}`);
    this.coinId = coinId;
  }
}
