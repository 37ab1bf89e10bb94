import { DomainError } from './DomainError';

/**
 * Thrown when applying a delta would take an inventory quantity below zero
 */
export class InsufficientInventoryError extends DomainError {
  public readonly recordId: string;
  public readonly delta: number;
  public readonly observedQuantity: number;

  public constructor(recordId: string, delta: number, observedQuantity: number) {
    super(
      `Insufficient inventory for ${recordId}: quantity ${observedQuantity} cannot absorb delta ${delta}`
    );
    this.recordId = recordId;
    this.delta = delta;
    this.observedQuantity = observedQuantity;
  }
}
