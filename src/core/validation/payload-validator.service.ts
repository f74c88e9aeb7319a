import { Injectable } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { InvalidPayloadError } from '../errors/esim.errors';
import { logger } from '../logger/logger.config';

/**
 * Validates untrusted payloads (upstream API responses, renewal context bags)
 */
@Injectable()
export class PayloadValidatorService {
  private readonly logger = logger();

  isValidPayloadStructure(payload: unknown): payload is object {
    return typeof payload === 'object' && payload !== null;
  }

  /**
   * Keys whose value is missing, null or blank
   */
  findMissingFields(
    payload: Record<string, unknown>,
    requiredFields: readonly string[],
  ): string[] {
    return requiredFields.filter((field) => {
      const value = payload[field];
      if (value === undefined || value === null) return true;
      return typeof value === 'string' && value.trim().length === 0;
    });
  }

  async validateWithDto<T extends object>(
    payload: unknown,
    dtoClass: ClassConstructor<T>,
  ): Promise<T> {
    if (!this.isValidPayloadStructure(payload) || Array.isArray(payload)) {
      this.logger.warn({ dto: dtoClass.name }, 'Invalid payload structure');
      throw new InvalidPayloadError(['payload must be an object']);
    }

    const dto = plainToInstance(dtoClass, payload);
    const errors = await validate(dto);

    if (errors.length > 0) {
      const errorMessages = this.flattenErrors(errors);
      this.logger.warn(
        { dto: dtoClass.name, errors: errorMessages },
        'Payload validation failed',
      );
      throw new InvalidPayloadError(errorMessages);
    }

    return dto;
  }

  private flattenErrors(errors: ValidationError[], prefix = ''): string[] {
    return errors.flatMap((error) => {
      const path = prefix ? `${prefix}.${error.property}` : error.property;
      const own = Object.values(error.constraints || {}).map(
        (message) => `${path}: ${message}`,
      );
      return [...own, ...this.flattenErrors(error.children || [], path)];
    });
  }
}
