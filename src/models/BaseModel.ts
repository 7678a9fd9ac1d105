import { Model, Pojo, QueryContext } from 'objection';
import { v7 as uuidv7 } from 'uuid';

/**
 * Timestamps and flags come back from SQLite as numbers; models list their
 * columns so both drivers yield `Date` and `boolean`.
 */
export function normalizeColumns(
  json: Pojo,
  dateColumns: readonly string[],
  booleanColumns: readonly string[] = []
): Pojo {
  for (const column of dateColumns) {
    const value = json[column];
    if (value !== null && value !== undefined && !(value instanceof Date)) {
      json[column] = new Date(value);
    }
  }
  for (const column of booleanColumns) {
    if (column in json) {
      json[column] = Boolean(json[column]);
    }
  }
  return json;
}

export class BaseModel extends Model {
  id!: string;
  created_at!: Date;

  protected get dateColumns(): readonly string[] {
    return ['created_at'];
  }

  $beforeInsert(_queryContext: QueryContext) {
    if (!this.id) {
      this.id = uuidv7();
    }
    if (!this.created_at) {
      this.created_at = new Date();
    }
  }

  $parseDatabaseJson(json: Pojo): Pojo {
    return normalizeColumns(super.$parseDatabaseJson(json), this.dateColumns);
  }
}
