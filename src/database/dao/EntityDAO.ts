/**
 * EntityDAO - shared CRUD over one configuration table.
 *
 * Subclasses describe their table and supply validate/encode/decode; the
 * base class owns the SQL, transactions, not-found handling and error
 * translation.
 */

import { DatabaseConnection } from '../connection';
import {
  EntityNotFoundError,
  ForeignKeyViolationError,
  MissingFieldError,
  StoreError,
  translateSqliteError,
} from '../errors';
import { EntityKind, Identified, SqlValue } from '../models';
import { createEntityLogger, Logger } from '../../utils/logger';

export interface EntityRepository<TEntity extends Identified, TData> {
  list(): TEntity[];
  getById(id: number): TEntity;
  create(data: TData): number;
  update(id: number, data: TData): void;
  delete(id: number): void;
}

export interface TableDescriptor {
  kind: EntityKind;
  table: string;
  // Writable columns, in the order encode() returns their values
  columns: readonly string[];
  enumValues?: readonly string[];
}

export abstract class EntityDAO<
  TEntity extends Identified,
  TData,
  TRow extends Identified,
> implements EntityRepository<TEntity, TData>
{
  protected logger: Logger;

  protected constructor(
    protected readonly connection: DatabaseConnection,
    protected readonly descriptor: TableDescriptor,
  ) {
    this.logger = createEntityLogger(descriptor.kind);
  }

  /**
   * Checks required fields, enumerations and parent references. Runs inside
   * the write transaction.
   */
  protected abstract validate(data: TData): void;

  protected abstract encode(data: TData): SqlValue[];

  protected abstract decode(row: TRow): TEntity;

  /**
   * Returns every row in insertion order
   */
  list(): TEntity[] {
    try {
      const rows = this.connection.all<TRow>(`${this.selectSql()} ORDER BY id`);
      return rows.map((row) => this.decode(row));
    } catch (error) {
      throw this.fail('list', error);
    }
  }

  getById(id: number): TEntity {
    try {
      const row = this.connection.get<TRow>(`${this.selectSql()} WHERE id = ?`, [id]);
      if (!row) {
        throw new EntityNotFoundError(this.descriptor.kind, id);
      }
      return this.decode(row);
    } catch (error) {
      throw this.fail('get', error, id);
    }
  }

  /**
   * Inserts a new row and returns its generated id
   */
  create(data: TData): number {
    const { table, columns } = this.descriptor;
    const placeholders = columns.map(() => '?').join(', ');

    try {
      const id = this.connection.transaction(() => {
        this.validate(data);
        const result = this.connection.run(
          `INSERT INTO ${table} (${columns.join(', ')}) VALUES (${placeholders})`,
          this.encode(data),
        );
        return Number(result.lastInsertRowid);
      });

      this.logger.info(`${this.descriptor.kind} created`, { id });
      return id;
    } catch (error) {
      throw this.fail('create', error);
    }
  }

  /**
   * Replaces every writable column of an existing row
   */
  update(id: number, data: TData): void {
    const { table, columns } = this.descriptor;
    const assignments = columns.map((column) => `${column} = ?`).join(', ');

    try {
      this.connection.transaction(() => {
        if (!this.exists(table, id)) {
          throw new EntityNotFoundError(this.descriptor.kind, id);
        }
        this.validate(data);
        this.connection.run(`UPDATE ${table} SET ${assignments} WHERE id = ?`, [
          ...this.encode(data),
          id,
        ]);
      });

      this.logger.info(`${this.descriptor.kind} updated`, { id });
    } catch (error) {
      throw this.fail('update', error, id);
    }
  }

  /**
   * Deletes a row. Dependent rows are removed by the ON DELETE CASCADE
   * clauses of the schema.
   */
  delete(id: number): void {
    try {
      const result = this.connection.run(`DELETE FROM ${this.descriptor.table} WHERE id = ?`, [id]);
      if (result.changes === 0) {
        throw new EntityNotFoundError(this.descriptor.kind, id);
      }

      this.logger.info(`${this.descriptor.kind} deleted`, { id });
    } catch (error) {
      throw this.fail('delete', error, id);
    }
  }

  protected listWhere(column: string, value: SqlValue): TEntity[] {
    try {
      const rows = this.connection.all<TRow>(
        `${this.selectSql()} WHERE ${column} = ? ORDER BY id`,
        [value],
      );
      return rows.map((row) => this.decode(row));
    } catch (error) {
      throw this.fail('list', error);
    }
  }

  protected requireText(field: string, value: string): void {
    if (typeof value !== 'string' || value.trim() === '') {
      throw new MissingFieldError(this.descriptor.kind, field);
    }
  }

  protected requireParent(field: string, parentTable: string, id: number): void {
    if (!Number.isInteger(id) || !this.exists(parentTable, id)) {
      throw new ForeignKeyViolationError(this.descriptor.kind, field, id);
    }
  }

  private exists(table: string, id: number): boolean {
    return (
      this.connection.get<{ found: number }>(`SELECT 1 AS found FROM ${table} WHERE id = ?`, [
        id,
      ]) !== undefined
    );
  }

  private selectSql(): string {
    const { table, columns } = this.descriptor;
    return `SELECT id, ${columns.join(', ')} FROM ${table}`;
  }

  private fail(operation: string, error: unknown, id?: number): unknown {
    const translated = translateSqliteError(
      error,
      this.descriptor.kind,
      this.descriptor.enumValues,
    );

    if (translated instanceof StoreError) {
      this.logger.warn(`Failed to ${operation} ${this.descriptor.kind}`, {
        id,
        code: translated.code,
        field: translated.field,
        message: translated.message,
      });
    } else {
      this.logger.error(`Failed to ${operation} ${this.descriptor.kind}:`, error);
    }

    return translated;
  }
}
