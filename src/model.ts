/**
 * @file model.ts
 * @description Typed table declarations and the registry that schema autogeneration reads.
 */

import { err, ok, type Result } from "neverthrow";
import { QueryError } from "./errors";
import { DataTypes, type Row, type SqlValue } from "./types";

export interface ForeignKeyConfig {
  table: string;
  column?: string;
  onDelete?: "CASCADE" | "SET NULL" | "RESTRICT";
}

export interface ColumnConfig {
  type: DataTypes;
  required?: boolean;
  unique?: boolean;
  defaultValue?: string | number | boolean;
  /** Creates a single-column index with this name. */
  index?: string;
  references?: ForeignKeyConfig;
}

export interface TimestampsConfig {
  createdAt?: string;
  updatedAt?: string;
}

export interface ModelConfig {
  tableName: string;
  /** Defaults to `id`. Integer primary keys auto-increment. */
  primaryKey?: string;
  columns: Record<string, ColumnConfig>;
  timestamps?: TimestampsConfig;
}

function isSqlValue(value: unknown): value is SqlValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "boolean" ||
    value instanceof Date ||
    Buffer.isBuffer(value)
  );
}

/**
 * A declared table. `TRow` is the shape of a row as read back through `hydrate`.
 */
export class ModelDefinition<TRow extends object = Row> {
  readonly tableName: string;
  readonly primaryKey: string;
  readonly columns: Readonly<Record<string, ColumnConfig>>;
  readonly timestamps: Readonly<TimestampsConfig>;

  constructor(config: ModelConfig) {
    this.tableName = config.tableName;
    this.primaryKey = config.primaryKey ?? "id";
    this.columns = config.columns;
    this.timestamps = config.timestamps ?? {};
    if (!(this.primaryKey in this.columns)) {
      throw new TypeError(`Model ${this.tableName} does not declare its primary key column "${this.primaryKey}"`);
    }
  }

  /** Declared columns followed by the timestamp columns, in table order. */
  columnNames(): string[] {
    const names = Object.keys(this.columns);
    for (const column of [this.timestamps.createdAt, this.timestamps.updatedAt]) {
      if (column && !names.includes(column)) names.push(column);
    }
    return names;
  }

  hasColumn(name: string): boolean {
    return this.columnNames().includes(name);
  }

  /** Cache namespace for reads of this table. */
  get cachePrefix(): string {
    return `${this.tableName}:`;
  }

  /**
   * Converts a raw row into `TRow`: integer booleans become booleans, JSON text is parsed and
   * dates are normalized to ISO strings.
   */
  hydrate(row: Row): TRow {
    const result: Row = { ...row };
    for (const [name, column] of Object.entries(this.columns)) {
      const value = result[name];
      if (value === null || value === undefined) continue;
      if (column.type === DataTypes.BOOLEAN && (typeof value === "number" || typeof value === "bigint")) {
        result[name] = Number(value) !== 0;
      } else if (column.type === DataTypes.JSON && typeof value === "string") {
        try {
          result[name] = JSON.parse(value);
        } catch {
          result[name] = value;
        }
      }
    }
    for (const [name, value] of Object.entries(result)) {
      if (value instanceof Date) result[name] = value.toISOString();
    }
    return result as TRow;
  }

  /**
   * Converts caller-supplied values into bindable parameters. Fields that are not columns of the
   * table are rejected; `undefined` fields are dropped.
   */
  dehydrate(values: Partial<TRow>): Result<Record<string, SqlValue>, QueryError> {
    const result: Record<string, SqlValue> = {};
    const entries: [string, unknown][] = Object.entries(values);
    for (const [name, value] of entries) {
      if (value === undefined) continue;
      if (!this.hasColumn(name)) {
        return err(new QueryError("unknown-column", `Unknown column "${name}" for table ${this.tableName}`));
      }
      const column = this.columns[name];
      if (column?.type === DataTypes.JSON && value !== null) {
        result[name] = JSON.stringify(value);
      } else if (isSqlValue(value)) {
        result[name] = value;
      } else {
        return err(new QueryError("invalid", `Value for ${this.tableName}.${name} cannot be bound as a parameter`));
      }
    }
    return ok(result);
  }
}

/**
 * Registry of declared models, read when a revision is autogenerated.
 */
export class MetadataStorage {
  private static models: Map<string, ModelDefinition<object>> = new Map();

  static register(model: ModelDefinition<object>): void {
    this.models.set(model.tableName, model);
  }

  static getModel(tableName: string): ModelDefinition<object> | undefined {
    return this.models.get(tableName);
  }

  /** Models in registration order, which autogeneration uses as creation order. */
  static getModels(): ModelDefinition<object>[] {
    return [...this.models.values()];
  }

  static clear(): void {
    this.models.clear();
  }
}

/**
 * Declares a table and registers it.
 * @example
 * ```
 * interface Note { id: number; body: string }
 * const Notes = defineModel<Note>({ tableName: "notes", columns: { id: { type: DataTypes.INTEGER }, body: { type: DataTypes.TEXT } } });
 * ```
 */
export function defineModel<TRow extends object>(config: ModelConfig): ModelDefinition<TRow> {
  const model = new ModelDefinition<TRow>(config);
  MetadataStorage.register(model);
  return model;
}
