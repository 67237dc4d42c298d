import {
  BadRequestException,
  Injectable,
  ValidationPipe,
  type ArgumentMetadata,
  type PipeTransform,
  type ValidationPipeOptions,
} from "@nestjs/common";
import type { ValidationError } from "class-validator";
import { InjectLogger } from "@foundry-console/io";
import type { Logger } from "pino";

export interface FlattenedValidationError {
  property: string;
  constraints?: Record<string, string>;
}

export function flattenValidationErrors(
  errors: ValidationError[],
  parentPath = "",
): FlattenedValidationError[] {
  return errors.flatMap((error) => {
    const property = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = error.constraints ? [{ property, constraints: error.constraints }] : [];
    return [...own, ...flattenValidationErrors(error.children ?? [], property)];
  });
}

@Injectable()
export class ApiValidationPipe implements PipeTransform {
  private readonly delegate: ValidationPipe;

  constructor(@InjectLogger("api:validation") private readonly logger: Logger) {
    this.delegate = new ValidationPipe(this.createOptions());
  }

  private createOptions(): ValidationPipeOptions {
    return {
      whitelist: true,
      forbidNonWhitelisted: false,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
      validationError: {
        target: false,
        value: false,
      },
      exceptionFactory: (errors: ValidationError[]) => {
        const flattened = flattenValidationErrors(errors);
        this.logger.warn({ errors: flattened }, "Request validation failed");
        return new BadRequestException({
          message: "Validation failed",
          errors: flattened,
        });
      },
    };
  }

  async transform(value: unknown, metadata: ArgumentMetadata): Promise<unknown> {
    try {
      return await this.delegate.transform(value, metadata);
    } catch (error) {
      this.logger.warn(
        {
          type: metadata.type,
          data: metadata.data,
          metatype: metadata.metatype?.name,
          message: error instanceof Error ? error.message : String(error),
        },
        "Validation pipeline rejected request"
      );
      throw error;
    }
  }
}
