/**
 * Schema validation engine for docs-bridge.
 *
 * Validates tool arguments against their declared JSON Schemas using ajv.
 * Schemas are compiled once at registration time and reused for every
 * request. Defaults declared in a schema are filled into the arguments.
 */

import _Ajv, { type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import type { JsonSchema, ToolDeclaration } from '../types/tool.js';

const POLLUTION_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

// ---------------------------------------------------------------------------
// Validation result
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  /** Name of the first offending top-level argument, when known. */
  field?: string;
}

// ---------------------------------------------------------------------------
// SchemaValidator
// ---------------------------------------------------------------------------

export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly validators: Map<string, ValidateFunction> = new Map();

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
  }

  /**
   * Compile a JSON Schema for a tool and cache the validator.
   *
   * @throws If the tool was already compiled or the schema is invalid.
   */
  compile(toolName: string, schema: JsonSchema): void {
    if (this.validators.has(toolName)) {
      throw new Error(`Schema already compiled for tool: "${toolName}"`);
    }

    this.validators.set(toolName, this.ajv.compile(schema));
  }

  compileFromTools(tools: ToolDeclaration[]): void {
    for (const tool of tools) {
      this.compile(tool.name, tool.arguments_schema);
    }
  }

  has(toolName: string): boolean {
    return this.validators.has(toolName);
  }

  /**
   * Validate arguments against a previously compiled schema. Declared
   * defaults are written into `args` in place.
   *
   * @throws If no schema has been compiled for the given tool name.
   */
  validate(toolName: string, args: Record<string, unknown>): ValidationResult {
    const validateFn = this.validators.get(toolName);
    if (!validateFn) {
      throw new Error(`No compiled schema for tool: "${toolName}"`);
    }

    const pollutionErrors = this.checkPollutionKeys(args, '');
    if (pollutionErrors.length > 0) {
      return { valid: false, errors: pollutionErrors };
    }

    if (validateFn(args)) {
      return { valid: true, errors: [] };
    }

    const rawErrors = validateFn.errors ?? [];
    const errors = rawErrors.map((err) => {
      const path = err.instancePath || '';
      if (err.keyword === 'additionalProperties') {
        return `${path}: additional property "${String(err.params['additionalProperty'])}" not allowed`;
      }
      if (err.keyword === 'required') {
        return `${path}: required property "${String(err.params['missingProperty'])}" is missing`;
      }
      return `${path}: ${err.message ?? 'unknown error'}`;
    });

    const first = rawErrors[0];
    let field: string | undefined;
    if (first?.keyword === 'required') {
      field = String(first.params['missingProperty']);
    } else if (first?.instancePath) {
      field = first.instancePath.split('/')[1];
    }

    return field ? { valid: false, errors, field } : { valid: false, errors };
  }

  private checkPollutionKeys(obj: unknown, path: string): string[] {
    if (obj === null || typeof obj !== 'object' || Array.isArray(obj)) {
      return [];
    }

    const errors: string[] = [];
    for (const [key, value] of Object.entries(obj)) {
      if (POLLUTION_KEYS.has(key)) {
        errors.push(`${path}/${key}: prototype pollution key "${key}" is not allowed`);
      }
      errors.push(...this.checkPollutionKeys(value, `${path}/${key}`));
    }
    return errors;
  }
}
