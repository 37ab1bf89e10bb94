/**
 * Point-in-time view of a record as returned by a single read.
 * Only valid for the attempt that read it.
 */
export interface VersionedSnapshot {
  quantity: number;
  version: number;
}

/**
 * Number of rows a compare-and-set changed: 1 when the write committed,
 * 0 when the stored version had moved on or the record is gone.
 */
export type RowsAffected = 0 | 1;

/**
 * Port for the versioned row store consumed by the optimistic updater.
 *
 * Both operations are atomic. Any rejection is treated as a store failure
 * (connection loss, timeout, malformed response) and is never retried by the
 * updater.
 *
 * Note: The 'I' prefix for port interfaces is required by the project's
 * architecture standards (Hexagonal Architecture pattern).
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IVersionedStore {
  /**
   * Reads a committed snapshot of the record.
   *
   * @param id - Record identifier
   * @returns The snapshot, or null when no record has this id
   */
  read(id: string): Promise<VersionedSnapshot | null>;

  /**
   * Writes `newQuantity` and advances the version to `expectedVersion + 1`,
   * only if the stored version still equals `expectedVersion`.
   *
   * The version check and the write happen under one transaction boundary;
   * no other writer can commit between them.
   *
   * @param id - Record identifier
   * @param newQuantity - Quantity to store
   * @param expectedVersion - Version observed by the caller's read
   * @returns 1 if the write committed, 0 otherwise
   */
  compareAndSet(id: string, newQuantity: number, expectedVersion: number): Promise<RowsAffected>;
}
