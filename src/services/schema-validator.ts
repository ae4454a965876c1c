import { readFileSync } from 'fs';
import { join } from 'path';
import { Ajv2020 } from 'ajv/dist/2020.js';
import type { SchemaObject, ErrorObject, ValidateFunction } from 'ajv';
import { ConfigError } from '../errors.js';
import type { AgentManifest, WorkflowDocument } from '../interfaces/index.js';
import { resolveSchemaPath } from '../utils/schema-path.js';

/**
 * Schema Validator Service
 * Validates agent manifests and workflow documents against the JSON schemas in schemas/
 */
export class SchemaValidatorService {
  private ajv: Ajv2020;
  private manifestValidator: ValidateFunction<AgentManifest>;
  private workflowValidator: ValidateFunction<WorkflowDocument>;

  constructor(schemaDir?: string) {
    this.ajv = new Ajv2020({ allErrors: true, strict: false });

    const load = (file: string): SchemaObject => {
      const path = schemaDir ? join(schemaDir, file) : resolveSchemaPath(file);
      const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
      if (!isSchemaObject(parsed)) {
        throw new ConfigError(`Schema ${file} is not a JSON object`);
      }
      return parsed;
    };

    this.manifestValidator = this.ajv.compile<AgentManifest>(load('agent-manifest.schema.json'));
    this.workflowValidator = this.ajv.compile<WorkflowDocument>(load('workflow-definition.schema.json'));
  }

  /**
   * Validate an agent manifest, throwing ConfigError with every problem found
   */
  assertAgentManifest(data: unknown, source = 'manifest'): AgentManifest {
    if (this.manifestValidator(data)) {
      return data;
    }
    throw new ConfigError(
      `Invalid agent ${source}`,
      formatErrors(this.manifestValidator.errors)
    );
  }

  /**
   * Validate a workflow document, throwing ConfigError with every problem found
   */
  assertWorkflowDocument(data: unknown, source = 'workflow'): WorkflowDocument {
    if (this.workflowValidator(data)) {
      return data;
    }
    throw new ConfigError(
      `Invalid ${source}`,
      formatErrors(this.workflowValidator.errors)
    );
  }
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) return [];
  return errors.map(error => {
    if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
      const parent = error.instancePath || '';
      return `missing required field '${parent ? `${parent.slice(1).replace(/\//g, '.')}.` : ''}${error.params.missingProperty}'`;
    }
    const location = error.instancePath ? error.instancePath.slice(1).replace(/\//g, '.') : '(root)';
    return `${location} ${error.message ?? 'is invalid'}`;
  });
}
