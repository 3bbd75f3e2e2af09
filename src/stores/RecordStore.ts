import { WithId } from "../models/types";
import { NotFoundError } from "../utils/errors";

/**
 * Append-only list of records held in process memory.
 *
 * Ids come from an interior counter that starts at the seed length, so an
 * empty store hands out 1..N in creation order. `create` runs without any
 * await between reading the counter and appending.
 */
export class RecordStore<T extends WithId> {
  private readonly records: T[];
  private lastId: number;

  constructor(
    private readonly label: string,
    seed: readonly T[] = [],
  ) {
    this.records = seed.map((record) => ({ ...record }));
    this.lastId = this.records.length;
  }

  get size(): number {
    return this.records.length;
  }

  list(): T[] {
    return [...this.records];
  }

  filter(predicate: (record: T) => boolean): T[] {
    return this.records.filter(predicate);
  }

  findById(id: number): T | undefined {
    return this.records.find((record) => record.id === id);
  }

  getById(id: number): T {
    const record = this.findById(id);
    if (!record) throw new NotFoundError(`${this.label} not found`);
    return record;
  }

  /** Builds the record from the next id and appends it. */
  create(build: (id: number) => T): T {
    this.lastId += 1;
    const record = build(this.lastId);
    this.records.push(record);
    return record;
  }
}
