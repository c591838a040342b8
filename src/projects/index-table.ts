// ---------------------------------------------------------------------------
// ProjectIndex – in-memory table of id → summary row
// ---------------------------------------------------------------------------
// Backs list/filter operations without touching record files. The durable
// copy is index.json; this class only holds the rows and the grouped view.
// ---------------------------------------------------------------------------

import type { ProjectFilter, ProjectIndexRow, ProjectStatus } from "./types.js";

export class ProjectIndex {
  private readonly rowsById = new Map<string, ProjectIndexRow>();
  private readonly idsByStatus = new Map<ProjectStatus, Set<string>>();

  constructor(rows: Iterable<ProjectIndexRow> = []) {
    for (const row of rows) {
      this.upsert(row);
    }
  }

  get size(): number {
    return this.rowsById.size;
  }

  has(id: string): boolean {
    return this.rowsById.has(id);
  }

  get(id: string): Readonly<ProjectIndexRow> | undefined {
    return this.rowsById.get(id);
  }

  upsert(row: ProjectIndexRow): void {
    const previous = this.rowsById.get(row.id);
    if (previous) {
      this.idsByStatus.get(previous.status)?.delete(row.id);
    }
    const frozen = Object.freeze({ ...row });
    this.rowsById.set(row.id, frozen);
    let ids = this.idsByStatus.get(row.status);
    if (!ids) {
      ids = new Set();
      this.idsByStatus.set(row.status, ids);
    }
    ids.add(row.id);
  }

  /**
   * Lazy, restartable view over the rows present when each iteration starts.
   * Insertion order is preserved.
   */
  rows(filter?: ProjectFilter): Iterable<Readonly<ProjectIndexRow>> {
    const status = filter?.status;
    return {
      [Symbol.iterator]: () => {
        const snapshot: Readonly<ProjectIndexRow>[] = [...this.rowsById.values()];
        return (function* () {
          for (const row of snapshot) {
            if (status === undefined || row.status === status) {
              yield row;
            }
          }
        })();
      },
    };
  }

  countByStatus(): Record<ProjectStatus, number> {
    const count = (status: ProjectStatus) => this.idsByStatus.get(status)?.size ?? 0;
    return {
      Received: count("Received"),
      InProgress: count("InProgress"),
      OnHold: count("OnHold"),
      Shipped: count("Shipped"),
      Cancelled: count("Cancelled"),
    };
  }
}
