// src/database/column-types.ts
import type { ColumnType, ValueTransformer } from 'typeorm';

// Column types are resolved when entity decorators run, so the driver is read
// from the environment here rather than from the injected config.
const SQLITE = process.env.DB_TYPE === 'sqlite';

export const TIMESTAMP: ColumnType = SQLITE ? 'datetime' : 'timestamptz';
export const UUID: ColumnType = SQLITE ? 'varchar' : 'uuid';

/** pg returns NUMERIC as string; expose every decimal as a JS number. */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null): number | null =>
    value === null || value === undefined ? null : Number(value),
};

export const MONEY = {
  type: 'decimal',
  precision: 12,
  scale: 2,
  default: 0,
  transformer: decimalTransformer,
} as const;
