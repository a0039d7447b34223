import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';

import { ExecutionResult } from '../../../src/catalog/interfaces/catalog.interface';
import { ApiResponse } from '../../../src/common/utils/response.util';
import { TableStructure } from '../../../src/schema-inspector/interfaces/table-structure.interface';
import { SyncOutcome } from '../../../src/schema-sync/interfaces/sync-outcome.interface';
import { Design, Field } from '../../../src/schema-sync/schemas/design.schema';

export class TestHelper {
  constructor(private readonly app: NestFastifyApplication) {}

  private get server() {
    return this.app.getHttpServer();
  }

  async createTable(
    design: Design,
    expectedStatus = 201,
    replace?: boolean,
  ): Promise<ApiResponse<SyncOutcome>> {
    const res = await request(this.server)
      .post('/api/tables')
      .send({ table: design, replace })
      .expect(expectedStatus);
    return res.body;
  }

  async addField(
    tableName: string,
    field: Field,
    expectedStatus = 201,
  ): Promise<ApiResponse<SyncOutcome>> {
    const res = await request(this.server)
      .post(`/api/tables/${tableName}/fields`)
      .send({ field })
      .expect(expectedStatus);
    return res.body;
  }

  async executeSql(sql: string, expectedStatus = 200): Promise<ApiResponse<ExecutionResult>> {
    const res = await request(this.server)
      .post('/api/execute-sql')
      .send({ sql })
      .expect(expectedStatus);
    return res.body;
  }

  /** Drops every table, managed or not, through the API. */
  async cleanup(): Promise<void> {
    const res = await request(this.server).get('/api/tables').expect(200);
    const tables: TableStructure[] = res.body.data;
    for (const table of tables) {
      await request(this.server).delete(`/api/tables/${table.name}`).expect(200);
    }
  }
}
