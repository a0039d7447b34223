import { Test, TestingModule } from '@nestjs/testing';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';

import { AppModule } from '../../../src/app.module';
import { configureApp } from '../../../src/app.setup';
import { Design } from '../../../src/schema-sync/schemas/design.schema';
import { TestHelper } from '../helpers/test-helper';

function usersDesign(name: string): Design {
  return {
    name,
    comment: 'Registered accounts',
    fields: [
      { name: 'id', type: 'INTEGER', primary: true },
      { name: 'email', type: 'VARCHAR', length: 120, unique: true, nullable: false },
      { name: 'age', type: 'INTEGER', default: 0 },
    ],
  };
}

describe('Tables API (e2e)', () => {
  let app: NestFastifyApplication;
  let helper: TestHelper;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(new FastifyAdapter());
    configureApp(app);
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
    helper = new TestHelper(app);
  });

  afterEach(async () => {
    await helper.cleanup();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/tables', () => {
    it('should create a table and return the recorded design', async () => {
      const body = await helper.createTable(usersDesign('users'));

      expect(body.success).toBe(true);
      expect(body.data).toMatchObject({ table: 'users', mode: 'created' });
      expect(body.data?.record?.version).toBe(1);
      expect(body.data?.record?.design).toEqual(usersDesign('users'));
    });

    it('should answer 409 for an existing table unless replace is set', async () => {
      await helper.createTable(usersDesign('users'));

      const conflict = await helper.createTable(usersDesign('users'), 409);
      expect(conflict.success).toBe(false);
      expect(conflict.error).toMatchObject({ title: 'Conflict', kind: 'TableAlreadyExists' });

      const replaced = await helper.createTable(usersDesign('users'), 201, true);
      expect(replaced.data?.mode).toBe('rebuilt');
      expect(replaced.data?.record?.version).toBe(2);
    });

    it('should reject a malformed body', async () => {
      const res = await request(app.getHttpServer())
        .post('/api/tables')
        .send({ table: { name: 'users' } })
        .expect(400);

      expect(res.body.success).toBe(false);
      expect(res.body.error.title).toBe('Validation error');
    });

    it('should reject a design without fields', async () => {
      const body = await helper.createTable({ name: 'empty', fields: [] }, 400);
      expect(body.error?.kind).toBe('InvalidDesign');
    });
  });

  describe('GET /api/tables/:name', () => {
    it('should return structure, design and drift', async () => {
      await helper.createTable(usersDesign('users'));
      await helper.executeSql('ALTER TABLE users ADD COLUMN notes TEXT');

      const res = await request(app.getHttpServer()).get('/api/tables/users').expect(200);

      expect(res.body.data.table.columns.map((column: { name: string }) => column.name)).toEqual([
        'id',
        'email',
        'age',
        'notes',
      ]);
      expect(res.body.data.comment).toBe('Registered accounts');
      expect(res.body.data.drift).toEqual({
        inSync: false,
        missingColumns: [],
        unexpectedColumns: ['notes'],
        primaryKeyMismatch: false,
      });
    });

    it('should answer 404 for a missing table', async () => {
      const res = await request(app.getHttpServer()).get('/api/tables/ghost').expect(404);

      expect(res.body.error).toEqual({
        title: 'Not found',
        message: 'Table ghost does not exist',
        kind: 'TableNotFound',
      });
    });
  });

  describe('fields', () => {
    it('should add, update and remove fields', async () => {
      await helper.createTable(usersDesign('users'));
      const server = app.getHttpServer();

      const added = await helper.addField('users', { name: 'city', type: 'TEXT' });
      expect(added.data?.mode).toBe('in-place');
      expect(added.data?.record?.version).toBe(2);

      const updated = await request(server)
        .put('/api/tables/users/fields/city')
        .send({ field: { name: 'town', type: 'TEXT', default: 'unknown' } })
        .expect(200);
      expect(updated.body.data.mode).toBe('rebuilt');
      expect(updated.body.data.record.design.fields[3]).toEqual({
        name: 'town',
        type: 'TEXT',
        default: 'unknown',
      });

      const removed = await request(server).delete('/api/tables/users/fields/town').expect(200);
      expect(removed.body.data.record.version).toBe(4);
      expect(
        removed.body.data.record.design.fields.map((field: { name: string }) => field.name),
      ).toEqual(['id', 'email', 'age']);
    });

    it('should answer 409 for a duplicate field', async () => {
      await helper.createTable(usersDesign('users'));

      const body = await helper.addField('users', { name: 'Email', type: 'TEXT' }, 409);

      expect(body.error?.kind).toBe('DuplicateField');
    });

    it('should answer 404 for an unknown field', async () => {
      await helper.createTable(usersDesign('users'));

      const res = await request(app.getHttpServer())
        .delete('/api/tables/users/fields/nickname')
        .expect(404);

      expect(res.body.error.message).toBe('Field nickname does not exist in users');
    });
  });

  describe('PUT /api/tables/:name', () => {
    it('should replace the table with the new design', async () => {
      await helper.createTable(usersDesign('users'));

      const res = await request(app.getHttpServer())
        .put('/api/tables/users')
        .send({ table: { fields: [{ name: 'id', type: 'INTEGER', primary: true }] } })
        .expect(200);

      expect(res.body.data.mode).toBe('rebuilt');
      expect(res.body.data.record.design).toEqual({
        name: 'users',
        fields: [{ name: 'id', type: 'INTEGER', primary: true }],
      });
    });
  });

  describe('POST /api/tables/:name/reconcile', () => {
    it('should record a design for a table created by hand', async () => {
      await helper.executeSql('CREATE TABLE legacy (id INTEGER PRIMARY KEY, title TEXT)');

      const res = await request(app.getHttpServer())
        .post('/api/tables/legacy/reconcile')
        .expect(200);

      expect(res.body.data.mode).toBe('reconciled');
      expect(res.body.data.record.design.fields.map((field: { name: string }) => field.name)).toEqual(
        ['id', 'title'],
      );
    });
  });

  describe('DELETE /api/tables/:name', () => {
    it('should drop the table and its design', async () => {
      await helper.createTable(usersDesign('users'));
      const server = app.getHttpServer();

      const res = await request(server).delete('/api/tables/users').expect(200);
      expect(res.body.data).toEqual({ table: 'users', designDeleted: true });

      const designs = await request(server).get('/api/designs').expect(200);
      expect(designs.body.data).toEqual([]);
    });
  });

  describe('GET /api/designs', () => {
    it('should summarise stored designs', async () => {
      await helper.createTable(usersDesign('users'));

      const res = await request(app.getHttpServer()).get('/api/designs').expect(200);

      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0]).toMatchObject({
        name: 'users',
        comment: 'Registered accounts',
        fieldCount: 3,
        version: 1,
      });
    });
  });
});
