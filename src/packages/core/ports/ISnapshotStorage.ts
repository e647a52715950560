/**
 * ISnapshotStorage - Port Interface for Durable State Snapshots
 *
 * Stores the whole engine state as one serialized document. Implementations
 * must leave the previous snapshot readable if a write fails part-way.
 *
 * @module packages/core/ports/ISnapshotStorage
 */

export interface ISnapshotStorage {
  /** Human-readable location, used in logs */
  readonly location: string;

  /**
   * Read the raw snapshot document
   * @returns Parsed JSON, or null when no snapshot exists yet
   */
  read(): Promise<unknown | null>;

  /**
   * Replace the stored snapshot
   */
  write(document: unknown): Promise<void>;
}
