import type { SqlClient } from '../db.js';
import { TABLE_NAMES, columnIdentifier, tableColumns, type ColumnSpec, type TableName } from './columns.js';

export type InsertStatement = {
  table: TableName;
  text: string;
  parameterCount: number;
};

function sqlType(column: ColumnSpec): string {
  const identifier = columnIdentifier(column.name);
  switch (column.kind) {
    case 'binary':
      return `${identifier} smallint check (${identifier} in (0, 1))`;
    case 'number':
      return `${identifier} numeric`;
    case 'text':
      return `${identifier} text`;
  }
}

export function buildCreateTableStatement(table: TableName): string {
  const definitions = [
    table === 'property'
      ? 'id serial primary key'
      : 'id serial primary key, property_id integer not null references property(id)',
    ...tableColumns(table).map(sqlType),
  ];
  return `create table if not exists ${table} (${definitions.join(', ')})`;
}

/**
 * Positional insert for one table. Satellites take the generated property id
 * as `$1`; property returns its own id.
 */
export function buildInsertStatement(table: TableName): InsertStatement {
  const columns = tableColumns(table).map((column) => columnIdentifier(column.name));
  if (table !== 'property') {
    columns.unshift('property_id');
  }
  const placeholders = columns.map((_, index) => `$${index + 1}`).join(', ');
  const returning = table === 'property' ? ' returning id' : '';
  return {
    table,
    text: `insert into ${table} (${columns.join(', ')}) values (${placeholders})${returning}`,
    parameterCount: columns.length,
  };
}

export const INSERT_STATEMENTS: Readonly<Record<TableName, InsertStatement>> = {
  property: buildInsertStatement('property'),
  leads: buildInsertStatement('leads'),
  valuation: buildInsertStatement('valuation'),
  rehab: buildInsertStatement('rehab'),
  hoa: buildInsertStatement('hoa'),
  taxes: buildInsertStatement('taxes'),
};

export async function ensureSchema(client: SqlClient): Promise<void> {
  for (const table of TABLE_NAMES) {
    await client.query(buildCreateTableStatement(table));
  }
}
