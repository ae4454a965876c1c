import { ConfigError } from '../errors.js';
import type { WorkflowDefinition, WorkflowStep } from '../interfaces/index.js';
import { compileGuard, type CompiledGuard } from './guard-expression.js';

export interface PlannedStep {
  step: WorkflowStep;
  /** Declaration index */
  index: number;
  /** dependsOn ∪ inputFrom */
  dependencies: string[];
  ancestors: ReadonlySet<string>;
  guard?: CompiledGuard;
  /** Context keys read through `${key}` input references */
  inputReferences: string[];
}

export interface WorkflowPlan {
  definition: WorkflowDefinition;
  steps: ReadonlyMap<string, PlannedStep>;
  /** Topological order, ties broken by declaration order */
  order: string[];
  /** Steps that directly depend on each step */
  dependents: ReadonlyMap<string, string[]>;
  warnings: string[];
}

const INPUT_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_-]*)(?:\.[A-Za-z0-9_.-]+)?\}/g;

/**
 * Validate a workflow's DAG and precompute what the engine needs to run it.
 * Every problem found is reported in one ConfigError.
 */
export function planWorkflow(definition: WorkflowDefinition): WorkflowPlan {
  const problems: string[] = [];
  const warnings: string[] = [];
  const byId = new Map<string, { step: WorkflowStep; index: number }>();

  definition.steps.forEach((step, index) => {
    if (byId.has(step.id)) {
      problems.push(`duplicate step id '${step.id}'`);
      return;
    }
    byId.set(step.id, { step, index });
  });

  const outputOwners = new Map<string, string>();
  for (const { step } of byId.values()) {
    const owner = outputOwners.get(step.outputKey);
    if (owner !== undefined) {
      problems.push(`steps '${owner}' and '${step.id}' both publish output key '${step.outputKey}'`);
    } else {
      outputOwners.set(step.outputKey, step.id);
    }
  }

  const dependencies = new Map<string, string[]>();
  for (const { step } of byId.values()) {
    const deps = Array.from(new Set([...step.dependsOn, ...step.inputFrom]));
    for (const dep of deps) {
      if (dep === step.id) {
        problems.push(`step '${step.id}' depends on itself`);
      } else if (!byId.has(dep)) {
        problems.push(`step '${step.id}' depends on unknown step '${dep}'`);
      }
    }
    dependencies.set(step.id, deps.filter(dep => dep !== step.id && byId.has(dep)));
  }

  const guards = new Map<string, CompiledGuard>();
  for (const { step } of byId.values()) {
    if (step.guard === undefined) continue;
    try {
      guards.set(step.id, compileGuard(step.guard));
    } catch (error) {
      if (!(error instanceof ConfigError)) throw error;
      problems.push(`step '${step.id}': ${error.message}`);
    }
  }

  const order = topologicalOrder(definition.steps, byId, dependencies);
  if (order.length < byId.size) {
    const stuck = Array.from(byId.keys()).filter(id => !order.includes(id));
    problems.push(`dependency cycle among steps: ${stuck.join(', ')}`);
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid workflow '${definition.name}'`, problems);
  }

  const ancestors = new Map<string, Set<string>>();
  for (const id of order) {
    const set = new Set<string>();
    for (const dep of dependencies.get(id) ?? []) {
      set.add(dep);
      for (const transitive of ancestors.get(dep) ?? []) set.add(transitive);
    }
    ancestors.set(id, set);
  }

  const seeded = new Set(Object.keys(definition.context));
  const steps = new Map<string, PlannedStep>();
  for (const { step, index } of byId.values()) {
    const guard = guards.get(step.id);
    const stepAncestors = ancestors.get(step.id) ?? new Set<string>();
    const inputReferences = collectInputReferences(step.inputs);

    const checkKey = (key: string, where: string): void => {
      const owner = outputOwners.get(key);
      if (owner !== undefined && !stepAncestors.has(owner)) {
        problems.push(
          `step '${step.id}' ${where} reads '${key}', published by '${owner}' which is not one of its ancestors`
        );
      } else if (owner === undefined && !seeded.has(key)) {
        warnings.push(`step '${step.id}' ${where} reads '${key}', which no step publishes`);
      }
    };

    for (const key of guard?.references ?? []) checkKey(key, 'guard');
    for (const key of inputReferences) checkKey(key, 'input');

    steps.set(step.id, {
      step,
      index,
      dependencies: dependencies.get(step.id) ?? [],
      ancestors: stepAncestors,
      guard,
      inputReferences
    });
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid workflow '${definition.name}'`, problems);
  }

  const dependents = new Map<string, string[]>();
  for (const id of order) dependents.set(id, []);
  for (const id of order) {
    for (const dep of dependencies.get(id) ?? []) {
      dependents.get(dep)?.push(id);
    }
  }

  return { definition, steps, order, dependents, warnings };
}

/**
 * Kahn's algorithm; ready steps are taken in declaration order.
 * Returns fewer ids than steps when there is a cycle.
 */
function topologicalOrder(
  declared: readonly WorkflowStep[],
  byId: ReadonlyMap<string, { step: WorkflowStep; index: number }>,
  dependencies: ReadonlyMap<string, string[]>
): string[] {
  const inDegree = new Map<string, number>();
  for (const id of byId.keys()) {
    inDegree.set(id, (dependencies.get(id) ?? []).length);
  }

  const order: string[] = [];
  const done = new Set<string>();
  let progressed = true;

  while (progressed) {
    progressed = false;
    for (const step of declared) {
      const id = step.id;
      if (done.has(id) || byId.get(id)?.step !== step) continue;
      if ((inDegree.get(id) ?? 0) > 0) continue;

      order.push(id);
      done.add(id);
      progressed = true;
      for (const [other, deps] of dependencies) {
        if (deps.includes(id)) {
          inDegree.set(other, (inDegree.get(other) ?? 0) - 1);
        }
      }
    }
  }

  return order;
}

/**
 * Context keys named by `${key}` or `${key.path}` anywhere in a step's inputs
 */
export function collectInputReferences(inputs: unknown): string[] {
  const keys = new Set<string>();
  const visit = (value: unknown): void => {
    if (typeof value === 'string') {
      for (const match of value.matchAll(INPUT_REFERENCE)) {
        keys.add(match[1]);
      }
    } else if (Array.isArray(value)) {
      value.forEach(visit);
    } else if (typeof value === 'object' && value !== null) {
      Object.values(value).forEach(visit);
    }
  };
  visit(inputs);
  return Array.from(keys);
}

/**
 * Replace `${key}` references with context values. A string that is exactly
 * one reference takes the referenced value as-is (undefined when absent);
 * references embedded in longer strings are interpolated.
 */
export function bindInputs(
  inputs: Readonly<Record<string, unknown>>,
  context: Readonly<Record<string, unknown>>
): Record<string, unknown> {
  const resolve = (path: string): unknown => {
    let value: unknown = context;
    for (const segment of path.split('.')) {
      if (typeof value !== 'object' || value === null || !Object.hasOwn(value, segment)) {
        return undefined;
      }
      value = Reflect.get(value, segment);
    }
    return value;
  };

  const bind = (value: unknown): unknown => {
    if (typeof value === 'string') {
      const whole = /^\$\{([^}]+)\}$/.exec(value);
      if (whole) return resolve(whole[1]);
      return value.replace(/\$\{([^}]+)\}/g, (_, path: string) => {
        const resolved = resolve(path);
        if (resolved === undefined || resolved === null) return '';
        return typeof resolved === 'object' ? JSON.stringify(resolved) : String(resolved);
      });
    }
    if (Array.isArray(value)) return value.map(bind);
    if (typeof value === 'object' && value !== null) {
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, bind(v)]));
    }
    return value;
  };

  return Object.fromEntries(Object.entries(inputs).map(([key, value]) => [key, bind(value)]));
}
