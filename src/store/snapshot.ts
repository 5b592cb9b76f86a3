import { v4 as uuidv4 } from 'uuid';
import type {
  ErrorMetricRecord,
  ServiceMetricRecord,
  TableName,
  TableRow,
  TimeWindow
} from '../types/telemetry.js';

export interface WindowQuery extends TimeWindow {
  /** Service rows by `serviceName`, error rows by `wmApplicationName` */
  service?: string;
}

type Tables = { readonly [K in TableName]: readonly TableRow<K>[] };

const SERVICE_OF: { [K in TableName]: (row: TableRow<K>) => string | null } = {
  service: row => row.serviceName,
  error: row => row.wmApplicationName
};

function byTime<T extends { recordTime: Date; id: string }>(a: T, b: T): number {
  return a.recordTime.getTime() - b.recordTime.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Index of the first row whose time is strictly greater than `time`.
 */
function upperBound(rows: readonly { recordTime: Date }[], time: number): number {
  let lo = 0;
  let hi = rows.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if (rows[mid].recordTime.getTime() <= time) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Immutable view over one generation of both tables. Rows are kept sorted by
 * record time so windowed reads are a binary search plus a slice.
 */
export class MetricSnapshot {
  readonly generation: string;
  readonly loadedAt: Date;
  private readonly tables: Tables;
  private readonly services: readonly string[];
  private readonly serviceSet: ReadonlySet<string>;

  constructor(service: readonly ServiceMetricRecord[], error: readonly ErrorMetricRecord[], loadedAt = new Date()) {
    this.generation = uuidv4();
    this.loadedAt = loadedAt;
    this.tables = Object.freeze({
      service: Object.freeze([...service].sort(byTime)),
      error: Object.freeze([...error].sort(byTime))
    });
    this.serviceSet = new Set(service.map(row => row.serviceName));
    this.services = Object.freeze([...this.serviceSet].sort());
    Object.freeze(this);
  }

  static empty(): MetricSnapshot {
    return new MetricSnapshot([], []);
  }

  /**
   * Rows with `start < recordTime <= end`, optionally for one service.
   */
  queryWindow<T extends TableName>(table: T, window?: WindowQuery): readonly TableRow<T>[];
  queryWindow<T extends TableName, K>(
    table: T,
    window: WindowQuery,
    groupBy: (row: TableRow<T>) => K
  ): Map<K, TableRow<T>[]>;
  queryWindow<T extends TableName, K>(
    table: T,
    window: WindowQuery = {},
    groupBy?: (row: TableRow<T>) => K
  ): readonly TableRow<T>[] | Map<K, TableRow<T>[]> {
    const rows: readonly TableRow<T>[] = this.tables[table];
    const from = window.start ? upperBound(rows, window.start.getTime()) : 0;
    const to = window.end ? upperBound(rows, window.end.getTime()) : rows.length;
    let selected = rows.slice(from, Math.max(from, to));

    if (window.service !== undefined) {
      const serviceOf: (row: TableRow<T>) => string | null = SERVICE_OF[table];
      selected = selected.filter(row => serviceOf(row) === window.service);
    }

    if (!groupBy) {
      return selected;
    }

    const groups = new Map<K, TableRow<T>[]>();
    for (const row of selected) {
      const key = groupBy(row);
      const group = groups.get(key);
      if (group) {
        group.push(row);
      } else {
        groups.set(key, [row]);
      }
    }
    return groups;
  }

  maxTimestamp(table: TableName): Date | null {
    const rows = this.tables[table];
    return rows.length > 0 ? new Date(rows[rows.length - 1].recordTime.getTime()) : null;
  }

  minTimestamp(table: TableName): Date | null {
    const rows = this.tables[table];
    return rows.length > 0 ? new Date(rows[0].recordTime.getTime()) : null;
  }

  /** Distinct service names, ascending */
  serviceNames(): readonly string[] {
    return this.services;
  }

  hasService(name: string): boolean {
    return this.serviceSet.has(name);
  }

  size(): { service: number; error: number } {
    return { service: this.tables.service.length, error: this.tables.error.length };
  }

  isEmpty(): boolean {
    return this.tables.service.length === 0 && this.tables.error.length === 0;
  }
}
