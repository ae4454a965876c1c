import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Coordinator, type CoordinatorOptions } from '../src/coordinator.js';
import { StructuredLogger } from '../src/services/structured-logger.js';
import type {
  AgentAction,
  AgentManifest,
  WorkflowDefinition,
  WorkflowStep
} from '../src/interfaces/index.js';

export function quietLogger(): StructuredLogger {
  return new StructuredLogger({ output: 'none', level: 'debug' });
}

export function tempProject(prefix = 'coordinator-test-'): { root: string; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), prefix));
  return { root, cleanup: () => rmSync(root, { recursive: true, force: true }) };
}

export function manifest(name: string, overrides: Partial<AgentManifest> = {}): AgentManifest {
  return {
    name,
    capabilities: ['testing'],
    priority: 'normal',
    permissions: {
      allow_read: ['**/*'],
      allow_write: []
    },
    ...overrides
  };
}

export function step(id: string, agent: string, overrides: Partial<WorkflowStep> = {}): WorkflowStep {
  return {
    id,
    agent,
    action: 'run',
    inputs: {},
    dependsOn: [],
    outputKey: id,
    required: true,
    inputFrom: [],
    ...overrides
  };
}

export function workflow(name: string, steps: WorkflowStep[], overrides: Partial<WorkflowDefinition> = {}): WorkflowDefinition {
  return {
    name,
    version: '1.0.0',
    context: {},
    execution: {},
    steps,
    ...overrides
  };
}

export function createCoordinator(options: CoordinatorOptions = {}): Coordinator {
  return new Coordinator({ logger: quietLogger(), ...options });
}

/**
 * Register an agent whose only action is `run`
 */
export function agentWith(
  coordinator: Coordinator,
  name: string,
  action: AgentAction,
  overrides: Partial<AgentManifest> = {}
): void {
  coordinator.registerAgent(manifest(name, overrides));
  coordinator.bindHandler(name, { actions: { run: action } });
}
