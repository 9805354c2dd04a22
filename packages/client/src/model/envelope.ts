import { InvalidRequestError } from '../core/errors.js';
import { formatCoordinate, validateCoordinates } from './coordinates.js';

export interface EnvelopeBounds {
  readonly west: number;
  readonly south: number;
  readonly east: number;
  readonly north: number;
}

/**
 * Immutable bounding box used by the overlaps operation
 */
export class Envelope implements EnvelopeBounds {
  readonly west: number;
  readonly south: number;
  readonly east: number;
  readonly north: number;

  constructor(bounds: EnvelopeBounds) {
    validateCoordinates(bounds.south, bounds.west);
    validateCoordinates(bounds.north, bounds.east);

    if (bounds.south > bounds.north) {
      throw new InvalidRequestError(
        `Envelope south (${bounds.south}) must not be greater than north (${bounds.north})`
      );
    }

    this.west = bounds.west;
    this.south = bounds.south;
    this.east = bounds.east;
    this.north = bounds.north;
    Object.freeze(this);
  }

  /**
   * Path form: `{south},{west},{north},{east}`
   */
  toPathSegment(): string {
    return [this.south, this.west, this.north, this.east].map(formatCoordinate).join(',');
  }

  toString(): string {
    return this.toPathSegment();
  }
}
