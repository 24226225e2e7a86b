import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { DatabaseClient, IntrospectedTable } from '../../db/types.js';
import { createPolicy } from '../../policy/policy.js';
import { SchemaCatalog, filterSchema } from '../catalog.js';
import { findTable } from '../types.js';

const RAW: IntrospectedTable[] = [
  {
    name: 'customers',
    columns: [
      { name: 'id', dataType: 'INTEGER', nullable: false, isPrimaryKey: true },
      { name: 'email', dataType: 'TEXT', nullable: true, isPrimaryKey: false },
      { name: 'Deleted_At', dataType: 'TEXT', nullable: true, isPrimaryKey: false },
    ],
  },
  {
    name: 'payroll',
    columns: [{ name: 'salary', dataType: 'INTEGER', nullable: false, isPrimaryKey: false }],
  },
  {
    name: 'orders',
    schema: 'public',
    columns: [{ name: 'total', dataType: 'numeric', nullable: true, isPrimaryKey: false }],
  },
];

function fakeDb(introspect: () => Promise<IntrospectedTable[]>): DatabaseClient & { calls: number } {
  const db: DatabaseClient & { calls: number } = {
    dialect: 'sqlite',
    calls: 0,
    introspect: async () => {
      db.calls += 1;
      return introspect();
    },
    executeReadOnly: async () => ({ columns: [], rows: [] }),
  };
  return db;
}

describe('filterSchema', () => {
  it('drops restricted tables and excluded columns', () => {
    const tables = filterSchema(RAW, createPolicy({ restrictedTables: ['payroll'], excludedColumns: ['EMAIL'] }));
    assert.deepEqual(
      tables.map((t) => t.name),
      ['customers', 'orders'],
    );
    assert.deepEqual(
      tables[0].columns.map((c) => c.name),
      ['id', 'Deleted_At'],
    );
  });

  it('keeps only allow-listed tables', () => {
    const tables = filterSchema(RAW, createPolicy({ allowedTables: ['orders'] }));
    assert.deepEqual(tables, [
      {
        name: 'orders',
        schema: 'public',
        columns: [{ name: 'total', dataType: 'numeric', nullable: true, isPrimaryKey: false }],
        hasSoftDelete: false,
      },
    ]);
  });

  it('marks soft-delete tables case-insensitively', () => {
    const tables = filterSchema(RAW, createPolicy());
    assert.equal(tables[0].hasSoftDelete, true);
    assert.equal(tables[1].hasSoftDelete, false);
  });

  it('does not mark a table whose soft-delete column is excluded', () => {
    const tables = filterSchema(RAW, createPolicy({ excludedColumns: ['deleted_at'] }));
    assert.equal(tables[0].hasSoftDelete, false);
  });

  it('freezes its output', () => {
    const [customers] = filterSchema(RAW, createPolicy());
    assert.ok(Object.isFrozen(customers));
    assert.ok(Object.isFrozen(customers.columns));
    assert.ok(Object.isFrozen(customers.columns[0]));
  });
});

describe('SchemaCatalog', () => {
  it('introspects once and shares the snapshot', async () => {
    const db = fakeDb(async () => RAW);
    const catalog = new SchemaCatalog(db, createPolicy({ restrictedTables: ['payroll'] }));

    const [a, b] = await Promise.all([catalog.snapshot(), catalog.snapshot()]);
    const c = await catalog.snapshot();

    assert.equal(db.calls, 1);
    assert.equal(a, b);
    assert.equal(a, c);
    assert.equal(a.connectionError, false);
    assert.equal(a.dialect, 'sqlite');
    assert.ok(Object.isFrozen(a));
    assert.equal(findTable(a, 'CUSTOMERS')?.name, 'customers');
    assert.equal(findTable(a, 'payroll'), undefined);
  });

  it('reports a failed introspection without caching it', async () => {
    let fail = true;
    const db = fakeDb(async () => {
      if (fail) throw new Error('connection refused');
      return RAW;
    });
    const catalog = new SchemaCatalog(db, createPolicy());

    const broken = await catalog.snapshot();
    assert.equal(broken.connectionError, true);
    assert.deepEqual(broken.tables, []);

    fail = false;
    const healthy = await catalog.snapshot();
    assert.equal(healthy.connectionError, false);
    assert.equal(healthy.tables.length, 3);
    assert.equal(db.calls, 2);
  });

  it('introspects again after invalidate', async () => {
    const db = fakeDb(async () => RAW);
    const catalog = new SchemaCatalog(db, createPolicy());
    const first = await catalog.snapshot();
    catalog.invalidate();
    const second = await catalog.snapshot();
    assert.notEqual(first, second);
    assert.equal(db.calls, 2);
  });

  it('does not cache a build that an invalidate overtook', async () => {
    const table = (name: string): IntrospectedTable => ({
      name,
      columns: [{ name: 'id', dataType: 'INTEGER', nullable: false, isPrimaryKey: true }],
    });
    let release: () => void = () => {};
    const db = fakeDb(async () => {
      if (db.calls === 1) {
        await new Promise<void>((resolve) => {
          release = resolve;
        });
        return [table('v1')];
      }
      return [table('v2')];
    });
    const catalog = new SchemaCatalog(db, createPolicy());

    const stale = catalog.snapshot();
    catalog.invalidate();
    const fresh = catalog.snapshot();
    release();

    assert.deepEqual(
      (await stale).tables.map((t) => t.name),
      ['v1'],
    );
    assert.deepEqual(
      (await fresh).tables.map((t) => t.name),
      ['v2'],
    );
    const later = await catalog.snapshot();
    assert.deepEqual(
      later.tables.map((t) => t.name),
      ['v2'],
    );
    assert.equal(db.calls, 2);
  });
});
