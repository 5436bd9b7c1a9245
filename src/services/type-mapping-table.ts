/**
 * Type Mapping Table
 *
 * Lookup from (source platform, source type) to (target platform, target type).
 * Built once per cascade run from the store's data_type_mappings table and
 * never mutated by the engine.
 */

import { DataTypeMapping, TypeConversion, TypeLookup } from '../types/index.js';

// source type, Databricks type, Power BI type
const DEFAULT_TYPE_ROWS: ReadonlyArray<readonly [string, string, string]> = [
  ['INT', 'INT', 'INT64'],
  ['BIGINT', 'BIGINT', 'INT64'],
  ['SMALLINT', 'SMALLINT', 'INT64'],
  ['TINYINT', 'TINYINT', 'INT64'],
  ['BIT', 'BOOLEAN', 'Boolean'],
  ['DECIMAL', 'DECIMAL', 'Decimal'],
  ['NUMERIC', 'NUMERIC', 'Decimal'],
  ['FLOAT', 'FLOAT', 'Double'],
  ['REAL', 'REAL', 'Double'],
  ['CHAR', 'CHAR', 'String'],
  ['VARCHAR', 'STRING', 'String'],
  ['TEXT', 'STRING', 'String'],
  ['NCHAR', 'STRING', 'String'],
  ['NVARCHAR', 'STRING', 'String'],
  ['NTEXT', 'STRING', 'String'],
  ['DATE', 'DATE', 'Date'],
  ['DATETIME', 'TIMESTAMP', 'DateTime'],
  ['DATETIME2', 'TIMESTAMP', 'DateTime'],
  ['SMALLDATETIME', 'TIMESTAMP', 'DateTime'],
  ['TIME', 'TIME', 'Time'],
  ['BINARY', 'BINARY', 'Binary'],
  ['VARBINARY', 'BINARY', 'Binary'],
  ['IMAGE', 'BINARY', 'Binary'],
  ['UNIQUEIDENTIFIER', 'STRING', 'String']
];

const DEFAULT_SOURCE_PLATFORMS = ['SQL Server', 'Azure SQL'];

/**
 * Default mappings from SQL Server / Azure SQL to Databricks and Power BI,
 * used when a store carries no mapping table
 */
export function defaultTypeMappings(): DataTypeMapping[] {
  const mappings: DataTypeMapping[] = [];
  for (const sourcePlatform of DEFAULT_SOURCE_PLATFORMS) {
    for (const [sourceType, databricksType, powerBiType] of DEFAULT_TYPE_ROWS) {
      mappings.push(
        { sourcePlatform, sourceDataType: sourceType, targetPlatform: 'Databricks', targetDataType: databricksType },
        { sourcePlatform, sourceDataType: sourceType, targetPlatform: 'Power BI', targetDataType: powerBiType }
      );
    }
  }
  return mappings;
}

function normalize(value: string): string {
  return value.trim().toLowerCase();
}

/**
 * Strip length/precision arguments: "nvarchar(50)" -> "nvarchar"
 */
export function baseDataType(dataType: string): string {
  const index = dataType.indexOf('(');
  return index === -1 ? dataType.trim() : dataType.slice(0, index).trim();
}

function key(sourcePlatform: string, sourceType: string, targetPlatform: string): string {
  return `${normalize(sourcePlatform)}\u0000${normalize(sourceType)}\u0000${normalize(targetPlatform)}`;
}

export class TypeMappingTable implements TypeLookup {
  private readonly entries: Map<string, string> = new Map();

  constructor(mappings: readonly DataTypeMapping[]) {
    for (const mapping of mappings) {
      const entryKey = key(mapping.sourcePlatform, mapping.sourceDataType, mapping.targetPlatform);
      // first entry wins
      if (!this.entries.has(entryKey)) {
        this.entries.set(entryKey, mapping.targetDataType);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Target type for a source type; the exact type is tried first, then its
   * base type without arguments
   */
  lookup(sourcePlatform: string, sourceType: string, targetPlatform: string): string | undefined {
    const exact = this.entries.get(key(sourcePlatform, sourceType, targetPlatform));
    if (exact !== undefined) {
      return exact;
    }
    const base = baseDataType(sourceType);
    if (base !== sourceType.trim()) {
      return this.entries.get(key(sourcePlatform, base, targetPlatform));
    }
    return undefined;
  }

  convert(sourcePlatform: string, sourceType: string, targetPlatform: string): TypeConversion {
    if (normalize(sourcePlatform) === normalize(targetPlatform)) {
      const sameTarget = this.lookup(sourcePlatform, sourceType, targetPlatform);
      return { dataType: sameTarget ?? sourceType, mapped: true };
    }
    const target = this.lookup(sourcePlatform, sourceType, targetPlatform);
    if (target === undefined) {
      return { dataType: sourceType, mapped: false };
    }
    return { dataType: target, mapped: true };
  }
}
