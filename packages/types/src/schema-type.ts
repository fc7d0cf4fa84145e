/**
 * JSON Schema backed capability.
 *
 * The schema is compiled once with Ajv when the capability is created. The
 * check has no inline form (the compiled Ajv function lives outside generated
 * code), so validators using it take the generic path.
 */

import AjvModule, {
  type Options as AjvOptions,
  type Schema,
  type ValidateFunction,
} from 'ajv';
import ajvFormats from 'ajv-formats';
import {
  SpecDefinitionError,
  defineCapability,
  fail,
  pass,
  type TypeCapability,
} from '@argspec/core';

// ajv and ajv-formats are CommonJS; their classes sit on `default` under ESM
const Ajv = AjvModule.default;
const addFormats = ajvFormats.default;

export type AjvInstance = InstanceType<typeof Ajv>;

export interface SchemaTypeOptions {
  /** Ajv instance to compile with (default: a shared instance with ajv-formats) */
  ajv?: AjvInstance;
  /** Capability name (default: the schema's `title`, else "schema") */
  name?: string;
}

const DEFAULT_AJV_OPTIONS: AjvOptions = {
  allErrors: false,
  strict: false,
};

let sharedAjv: AjvInstance | undefined;

export function createAjv(options: AjvOptions = {}): AjvInstance {
  const ajv = new Ajv({ ...DEFAULT_AJV_OPTIONS, ...options });
  addFormats(ajv);
  return ajv;
}

function defaultAjv(): AjvInstance {
  sharedAjv ??= createAjv();
  return sharedAjv;
}

function schemaName(schema: Schema): string {
  if (typeof schema === 'boolean') return 'schema';
  const title: unknown = schema.title;
  return typeof title === 'string' && title.length > 0 ? title : 'schema';
}

export function schemaType<T = unknown>(
  schema: Schema,
  options: SchemaTypeOptions = {}
): TypeCapability<T> {
  const ajv = options.ajv ?? defaultAjv();
  const name = options.name ?? schemaName(schema);

  const asyncFlag: unknown = typeof schema === 'object' ? schema.$async : undefined;
  if (asyncFlag === true) {
    throw new SpecDefinitionError({
      message: `${name}: asynchronous schemas cannot back a type capability`,
      context: { validator: name },
    });
  }

  let validate: ValidateFunction;
  try {
    validate = ajv.compile(schema);
  } catch (error) {
    throw new SpecDefinitionError({
      message: `${name}: schema does not compile: ${error instanceof Error ? error.message : String(error)}`,
      context: { validator: name },
      cause: error instanceof Error ? error : undefined,
    });
  }

  return defineCapability<T>({
    name,
    check: (value) =>
      validate(value)
        ? pass()
        : fail(ajv.errorsText(validate.errors, { dataVar: 'value' })),
  });
}
