/**
 * SQL dialects recognised by {@link detectDialect} and {@link parseDatabaseError}.
 */
export type Dialect = 'postgres' | 'mysql' | 'sqlite' | 'mssql'
