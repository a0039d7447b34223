import { HttpStatus, applyDecorators } from '@nestjs/common';
import { ApiExtraModels, ApiProperty, ApiResponse, getSchemaPath } from '@nestjs/swagger';

import type { SchemaErrorKind } from '../errors/schema.exception';

/**
 * Envelope around every API response body.
 */
export class ApiEnvelopeDto {
  @ApiProperty()
  success!: boolean;

  @ApiProperty({ example: '2026-01-01T00:00:00.000Z' })
  timestamp!: string;
}

/**
 * Documents a successful response: `data` carries the operation result.
 */
export const ApiEnvelopeResponse = (description: string, status: HttpStatus = HttpStatus.OK) => {
  return applyDecorators(
    ApiExtraModels(ApiEnvelopeDto),
    ApiResponse({
      status,
      description,
      schema: {
        allOf: [
          { $ref: getSchemaPath(ApiEnvelopeDto) },
          { properties: { data: { type: 'object' } } },
        ],
      },
    }),
  );
};

/**
 * Documents a failure response whose `error.kind` is one of `kinds`.
 */
export const ApiErrorResponse = (status: HttpStatus, ...kinds: SchemaErrorKind[]) => {
  return applyDecorators(
    ApiExtraModels(ApiEnvelopeDto),
    ApiResponse({
      status,
      description: kinds.join(', '),
      schema: {
        allOf: [
          { $ref: getSchemaPath(ApiEnvelopeDto) },
          {
            properties: {
              error: {
                type: 'object',
                properties: {
                  title: { type: 'string' },
                  message: { type: 'string' },
                  kind: { type: 'string', enum: kinds },
                },
              },
            },
          },
        ],
      },
    }),
  );
};
