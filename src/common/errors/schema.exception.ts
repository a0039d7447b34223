import { HttpException, HttpStatus } from '@nestjs/common';

export type SchemaErrorKind =
  | 'InvalidDesign'
  | 'InvalidField'
  | 'TableNotFound'
  | 'DesignNotFound'
  | 'FieldNotFound'
  | 'DuplicateField'
  | 'TableAlreadyExists'
  | 'SchemaOperationFailed'
  | 'DesignPersistenceFailed';

const STATUS_BY_KIND: Record<SchemaErrorKind, HttpStatus> = {
  InvalidDesign: HttpStatus.BAD_REQUEST,
  InvalidField: HttpStatus.BAD_REQUEST,
  TableNotFound: HttpStatus.NOT_FOUND,
  DesignNotFound: HttpStatus.NOT_FOUND,
  FieldNotFound: HttpStatus.NOT_FOUND,
  DuplicateField: HttpStatus.CONFLICT,
  TableAlreadyExists: HttpStatus.CONFLICT,
  SchemaOperationFailed: HttpStatus.BAD_REQUEST,
  DesignPersistenceFailed: HttpStatus.INTERNAL_SERVER_ERROR,
};

/**
 * Failure of a design or schema operation. The `kind` travels to the client
 * next to the message so callers can branch on it.
 */
export class SchemaException extends HttpException {
  constructor(
    readonly kind: SchemaErrorKind,
    message: string,
    cause?: unknown,
  ) {
    super(message, STATUS_BY_KIND[kind], cause === undefined ? undefined : { cause });
    this.name = kind;
  }

  static invalidDesign(message: string): SchemaException {
    return new SchemaException('InvalidDesign', message);
  }

  static invalidField(message: string): SchemaException {
    return new SchemaException('InvalidField', message);
  }

  static tableNotFound(tableName: string): SchemaException {
    return new SchemaException('TableNotFound', `Table ${tableName} does not exist`);
  }

  static designNotFound(tableName: string): SchemaException {
    return new SchemaException('DesignNotFound', `No stored design for table ${tableName}`);
  }

  static fieldNotFound(tableName: string, fieldName: string): SchemaException {
    return new SchemaException('FieldNotFound', `Field ${fieldName} does not exist in ${tableName}`);
  }

  static duplicateField(tableName: string, fieldName: string): SchemaException {
    return new SchemaException(
      'DuplicateField',
      `Field ${fieldName} already exists in ${tableName}`,
    );
  }

  static tableAlreadyExists(tableName: string): SchemaException {
    return new SchemaException(
      'TableAlreadyExists',
      `Table ${tableName} already exists; pass replace=true to drop and recreate it`,
    );
  }

  static operationFailed(cause: unknown): SchemaException {
    return new SchemaException(
      'SchemaOperationFailed',
      `Schema operation failed: ${errorMessage(cause)}`,
      cause,
    );
  }

  static persistenceFailed(tableName: string, cause: unknown): SchemaException {
    return new SchemaException(
      'DesignPersistenceFailed',
      `Schema of ${tableName} changed but its design could not be recorded: ${errorMessage(cause)}`,
      cause,
    );
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
