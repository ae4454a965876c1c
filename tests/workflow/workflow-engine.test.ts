/**
 * Workflow Engine Tests
 * Wave scheduling, guards, failure propagation, retries and cancellation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import type { Coordinator } from '../../src/coordinator.js';
import { ConfigError } from '../../src/errors.js';
import type { StepOutcome, WorkflowState } from '../../src/interfaces/index.js';
import { agentWith, createCoordinator, step, tempProject, workflow } from '../helpers.js';

function outcome(steps: StepOutcome[], id: string): StepOutcome {
  const found = steps.find(s => s.stepId === id);
  if (!found) throw new Error(`no outcome for ${id}`);
  return found;
}

describe('WorkflowEngine', () => {
  let project: ReturnType<typeof tempProject>;
  let coordinator: Coordinator;

  beforeEach(() => {
    project = tempProject('engine-');
    coordinator = createCoordinator({ projectRoot: project.root });
  });

  afterEach(() => {
    project.cleanup();
  });

  describe('scheduling', () => {
    it('should run dependent steps in successive waves and publish outputs between them', async () => {
      let seenByConsumer: unknown;
      agentWith(coordinator, 'producer', async () => ({ score: 88 }));
      agentWith(coordinator, 'consumer', async ({ context }) => {
        seenByConsumer = context.quality;
        return 'done';
      });

      const result = await coordinator.engine.run(workflow('seq', [
        step('analyze', 'producer', { outputKey: 'quality' }),
        step('report', 'consumer', { dependsOn: ['analyze'] })
      ]));

      expect(result.state).toBe('completed');
      expect(result.waves).toEqual([['analyze'], ['report']]);
      expect(seenByConsumer).toEqual({ score: 88 });
      expect(result.context).toEqual({ quality: { score: 88 }, report: 'done' });
      expect(result.steps.map(s => [s.stepId, s.state, s.wave, s.attempts])).toEqual([
        ['analyze', 'completed', 0, 1],
        ['report', 'completed', 1, 1]
      ]);
    });

    it('should run independent steps in one wave up to the concurrency limit', async () => {
      let active = 0;
      let peak = 0;
      agentWith(coordinator, 'worker', async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(20);
        active--;
      });

      const result = await coordinator.engine.run(
        workflow('fan-out', ['a', 'b', 'c', 'd'].map(id => step(id, 'worker'))),
        { maxConcurrent: 2 }
      );

      expect(result.waves).toEqual([['a', 'b', 'c', 'd']]);
      expect(peak).toBe(2);
    });

    it('should take the workflow concurrency when the run gives none', async () => {
      let active = 0;
      let peak = 0;
      agentWith(coordinator, 'worker', async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(20);
        active--;
      });

      await coordinator.engine.run(workflow('serial', ['a', 'b', 'c'].map(id => step(id, 'worker')), {
        execution: { maxConcurrent: 1 }
      }));

      expect(peak).toBe(1);
    });

    it('should dispatch higher priority agents first within a wave', async () => {
      const started: string[] = [];
      agentWith(coordinator, 'janitor', async ({ action }) => {
        started.push(`janitor:${action}`);
      }, { priority: 'low' });
      agentWith(coordinator, 'scanner', async ({ action }) => {
        started.push(`scanner:${action}`);
      }, { priority: 'high' });

      const result = await coordinator.engine.run(
        workflow('priorities', [step('cleanup', 'janitor'), step('scan', 'scanner')]),
        { maxConcurrent: 1 }
      );

      expect(started).toEqual(['scanner:run', 'janitor:run']);
      expect(result.waves).toEqual([['scan', 'cleanup']]);
    });

    it('should show a step only the context of earlier waves', async () => {
      let sawSibling: boolean | undefined;
      agentWith(coordinator, 'first', async () => 'published');
      agentWith(coordinator, 'second', async ({ context }) => {
        sawSibling = Object.hasOwn(context, 'one');
      });

      await coordinator.engine.run(
        workflow('siblings', [step('one', 'first'), step('two', 'second')]),
        { maxConcurrent: 1 }
      );

      expect(sawSibling).toBe(false);
    });

    it('should bind inputs from the context and inputFrom outputs', async () => {
      let received: unknown;
      agentWith(coordinator, 'producer', async () => ({ findings: ['f1', 'f2'] }));
      agentWith(coordinator, 'consumer', async ({ inputs }) => {
        received = inputs;
      });

      await coordinator.engine.run(workflow('binding', [
        step('scan', 'producer', { outputKey: 'quality' }),
        step('docs', 'consumer', {
          inputFrom: ['scan'],
          inputs: { findings: '${quality.findings}', title: 'Report for ${team}' }
        })
      ], { context: { team: 'platform' } }));

      expect(received).toEqual({
        findings: ['f1', 'f2'],
        title: 'Report for platform',
        quality: { findings: ['f1', 'f2'] }
      });
    });

    it('should copy returned payloads and seeded values instead of freezing them', async () => {
      const cache = { count: 0 };
      agentWith(coordinator, 'cached', async () => {
        cache.count++;
        return cache;
      });
      const seed = { opts: { level: 1 } };
      const definition = workflow('cache', [step('a', 'cached')], { context: { seed } });

      const first = await coordinator.engine.run(definition);
      const second = await coordinator.engine.run(definition);
      seed.opts.level = 2;

      expect(first.context).toEqual({ seed: { opts: { level: 1 } }, a: { count: 1 } });
      expect(second.state).toBe('completed');
      expect(second.context.a).toEqual({ count: 2 });
      expect(Object.isFrozen(cache)).toBe(false);
      expect(seed.opts.level).toBe(2);
    });

    it('should merge run context over the workflow context', async () => {
      let threshold: unknown;
      agentWith(coordinator, 'reader', async ({ context }) => {
        threshold = context.threshold;
      });

      await coordinator.engine.run(
        workflow('ctx', [step('read', 'reader')], { context: { threshold: 50 } }),
        { context: { threshold: 75 } }
      );

      expect(threshold).toBe(75);
    });
  });

  describe('guards', () => {
    it('should skip a step whose guard is false and keep its plain dependents', async () => {
      agentWith(coordinator, 'worker', async () => 'ok');

      const result = await coordinator.engine.run(workflow('guarded', [
        step('scan', 'worker'),
        step('docs', 'worker', { dependsOn: ['scan'], guard: 'security_score > 80' }),
        step('publish', 'worker', { inputFrom: ['docs'] }),
        step('notify', 'worker', { dependsOn: ['docs'] })
      ]));

      expect(result.state).toBe('completed');
      expect(outcome(result.steps, 'docs')).toMatchObject({
        state: 'skipped',
        reason: "guard 'security_score > 80' evaluated false",
        attempts: 0,
        wave: null,
        result: { status: 'skipped', payload: null, durationMs: 0, sideEffects: [] }
      });
      expect(outcome(result.steps, 'publish')).toMatchObject({
        state: 'skipped',
        reason: "required output of step 'docs' is absent"
      });
      expect(outcome(result.steps, 'notify').state).toBe('completed');
      expect(result.waves).toEqual([['scan'], ['notify']]);
    });

    it('should run a guarded step when the guard holds', async () => {
      agentWith(coordinator, 'scanner', async () => ({ score: 95 }));
      agentWith(coordinator, 'writer', async () => 'written');

      const result = await coordinator.engine.run(workflow('guarded', [
        step('scan', 'scanner', { outputKey: 'security' }),
        step('docs', 'writer', { dependsOn: ['scan'], guard: 'security.score >= min_score' })
      ], { context: { min_score: 90 } }));

      expect(outcome(result.steps, 'docs').state).toBe('completed');
    });
  });

  describe('failures', () => {
    it('should fail the run on a required step failure and skip what follows', async () => {
      agentWith(coordinator, 'fragile', async () => {
        throw new Error('broken');
      });
      agentWith(coordinator, 'worker', async () => 'ok');

      const result = await coordinator.engine.run(workflow('fails', [
        step('a', 'fragile'),
        step('b', 'worker', { dependsOn: ['a'] })
      ]));

      expect(result.state).toBe('failed');
      expect(result.failedStep).toBe('a');
      expect(outcome(result.steps, 'a')).toMatchObject({
        state: 'failed',
        reason: 'AgentInternalError: broken',
        errorKind: 'AgentInternalError',
        attempts: 1,
        wave: 0
      });
      expect(outcome(result.steps, 'b')).toMatchObject({
        state: 'skipped',
        reason: "not started: workflow failed at step 'a'",
        wave: null
      });
      expect(result.context).toEqual({});
    });

    it('should not start queued steps of the failing wave', async () => {
      agentWith(coordinator, 'fragile', async () => {
        throw new Error('broken');
      });
      agentWith(coordinator, 'worker', async () => 'ok');

      const result = await coordinator.engine.run(
        workflow('fails', [step('x', 'fragile'), step('y', 'worker')]),
        { maxConcurrent: 1 }
      );

      expect(outcome(result.steps, 'y')).toMatchObject({
        state: 'skipped',
        reason: "not started: workflow failed at step 'x'",
        wave: 0
      });
    });

    it('should contain an optional step failure and leave its key absent', async () => {
      agentWith(coordinator, 'fragile', async () => {
        throw new Error('flaky scanner');
      });
      agentWith(coordinator, 'worker', async () => 'ok');

      const result = await coordinator.engine.run(workflow('optional', [
        step('scan', 'fragile', { required: false }),
        step('fallback', 'worker', { dependsOn: ['scan'], guard: '!exists(scan)' })
      ]));

      expect(result.state).toBe('completed');
      expect(outcome(result.steps, 'scan')).toMatchObject({
        state: 'skipped_with_warning',
        reason: 'optional step failed: AgentInternalError: flaky scanner'
      });
      expect(outcome(result.steps, 'fallback').state).toBe('completed');
      expect(Object.hasOwn(result.context, 'scan')).toBe(false);
    });

    it('should fail a step whose agent is not registered', async () => {
      const result = await coordinator.engine.run(workflow('ghost', [step('a', 'nobody')]));

      expect(outcome(result.steps, 'a')).toMatchObject({
        state: 'failed',
        errorKind: 'NotFoundError',
        reason: "NotFoundError: Agent 'nobody' is not registered",
        attempts: 0
      });
    });

    it('should fail a step whose agent is inactive', async () => {
      agentWith(coordinator, 'retired', async () => 'ok', { status: 'inactive' });

      const result = await coordinator.engine.run(workflow('inactive', [step('a', 'retired')]));

      expect(outcome(result.steps, 'a').reason).toBe("NotFoundError: Agent 'retired' is inactive");
    });
  });

  describe('write ownership', () => {
    it('should preempt a writer whose glob intersects a higher priority writer', async () => {
      agentWith(coordinator, 'markdown', async ({ files }) => {
        await files.writeFile('docs/a.md', 'A');
      }, { priority: 'high', permissions: { allow_read: ['**/*'], allow_write: ['**/*.md'] } });
      agentWith(coordinator, 'docs', async ({ files }) => {
        await sleep(50);
        await files.writeFile('docs/a.md', 'B');
      }, { permissions: { allow_read: ['**/*'], allow_write: ['docs/**'] } });

      const result = await coordinator.engine.run(workflow('overlap', [step('a', 'markdown'), step('b', 'docs')]));

      expect(result.waves).toEqual([['a', 'b']]);
      expect(outcome(result.steps, 'a').state).toBe('completed');
      expect(outcome(result.steps, 'b')).toMatchObject({
        state: 'failed',
        errorKind: 'ResourceConflict',
        reason: "ResourceConflict: Write target 'docs/**' is granted to step 'a'",
        attempts: 0
      });
      expect(readFileSync(join(project.root, 'docs', 'a.md'), 'utf-8')).toBe('A');
    });

    it('should keep a written file with its first writer until the wave ends', async () => {
      agentWith(coordinator, 'quick', async ({ files }) => {
        await files.writeFile('docs/a.md', 'A');
      }, { permissions: { allow_read: ['**/*'], allow_write: ['**/*'] } });
      agentWith(coordinator, 'late', async ({ files }) => {
        await sleep(50);
        await files.writeFile('docs/a.md', 'B');
      }, { permissions: { allow_read: ['**/*'], allow_write: ['**/*'] } });

      const result = await coordinator.engine.run(workflow('undeclared', [
        step('a', 'quick', { writes: ['docs/a.md'] }),
        step('b', 'late', { writes: ['notes/b.md'] })
      ]), { runId: 'run-locks' });

      expect(result.waves).toEqual([['a', 'b']]);
      expect(outcome(result.steps, 'a').state).toBe('completed');
      expect(outcome(result.steps, 'b')).toMatchObject({
        state: 'failed',
        errorKind: 'ResourceConflict',
        reason: "ResourceConflict: 'docs/a.md' is being written by run-locks:a",
        attempts: 1
      });
      expect(readFileSync(join(project.root, 'docs', 'a.md'), 'utf-8')).toBe('A');
      expect(coordinator.hub.lockHolder('docs/a.md')).toBeUndefined();
    });
  });

  describe('retries', () => {
    it('should retry a transient failure with a fresh session', async () => {
      let calls = 0;
      agentWith(coordinator, 'flaky', async () => {
        calls++;
        if (calls === 1) throw new Error('transient');
        return 'recovered';
      });

      const result = await coordinator.engine.run(workflow('retry', [
        step('a', 'flaky', { retry: { count: 2, backoffSeconds: 0 } })
      ]), { runId: 'run-retry' });

      const sessions = coordinator.auditLog
        .query({ runId: 'run-retry', action: 'session.open' })
        .map(entry => entry.details?.session);

      expect(outcome(result.steps, 'a')).toMatchObject({ state: 'completed', attempts: 2 });
      expect(new Set(sessions).size).toBe(2);
      const retries = coordinator.auditLog.query({ runId: 'run-retry', action: 'step.retry' });
      expect(retries.map(e => [e.attempt, e.details?.errorKind])).toEqual([[2, 'AgentInternalError']]);
    });

    it('should stop after the retry budget', async () => {
      let calls = 0;
      agentWith(coordinator, 'broken', async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      });

      const result = await coordinator.engine.run(workflow('budget', [
        step('a', 'broken', { retry: { count: 2, backoffSeconds: 0 } })
      ]));

      expect(calls).toBe(3);
      expect(outcome(result.steps, 'a')).toMatchObject({
        state: 'failed',
        attempts: 3,
        reason: 'AgentInternalError: failure 3'
      });
    });

    it('should not retry a permission violation', async () => {
      let calls = 0;
      agentWith(coordinator, 'trespasser', async ({ files }) => {
        calls++;
        await files.writeFile('forbidden.txt', 'x');
      });

      const result = await coordinator.engine.run(workflow('no-retry', [
        step('a', 'trespasser', { retry: { count: 3, backoffSeconds: 0 } })
      ]));

      expect(calls).toBe(1);
      expect(outcome(result.steps, 'a')).toMatchObject({ errorKind: 'PermissionViolation', attempts: 1 });
    });
  });

  describe('cancellation', () => {
    it('should let in-flight steps finish and cancel the rest', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      let markStarted: () => void = () => undefined;
      const started = new Promise<void>(resolve => {
        markStarted = resolve;
      });

      agentWith(coordinator, 'slow', async () => {
        markStarted();
        await gate;
        return 'finished';
      });
      agentWith(coordinator, 'worker', async () => 'ok');

      const running = coordinator.engine.run(workflow('cancel-me', [
        step('a', 'slow'),
        step('b', 'worker', { dependsOn: ['a'] })
      ]), { runId: 'run-cancel' });

      await started;
      expect(coordinator.engine.getRunState('run-cancel')).toBe('running');
      expect(coordinator.engine.cancel('run-cancel')).toBe(true);
      release();
      const result = await running;

      expect(result.state).toBe('cancelled');
      expect(outcome(result.steps, 'a').state).toBe('completed');
      expect(outcome(result.steps, 'b')).toMatchObject({
        state: 'cancelled',
        reason: 'workflow cancelled before the step started'
      });
      expect(coordinator.engine.cancel('run-cancel')).toBe(false);
      expect(coordinator.engine.activeRuns()).toEqual([]);
    });

    it('should cancel through an already aborted signal', async () => {
      agentWith(coordinator, 'worker', async () => 'ok');
      const controller = new AbortController();
      controller.abort();

      const result = await coordinator.engine.run(workflow('aborted', [step('a', 'worker')]), {
        signal: controller.signal
      });

      expect(result.state).toBe('cancelled');
      expect(result.waves).toEqual([]);
      expect(outcome(result.steps, 'a').state).toBe('cancelled');
    });

    it('should not start another attempt once cancelled during a retry backoff', async () => {
      let calls = 0;
      agentWith(coordinator, 'unsteady', async () => {
        calls++;
        throw new Error('transient');
      });
      const controller = new AbortController();
      coordinator.engine.on('step:retry', () => {
        setTimeout(() => controller.abort(), 20);
      });

      const startedAt = Date.now();
      const result = await coordinator.engine.run(workflow('backoff', [
        step('a', 'unsteady', { retry: { count: 3, backoffSeconds: 1 } })
      ]), { signal: controller.signal });

      expect(Date.now() - startedAt).toBeLessThan(900);
      expect(calls).toBe(1);
      expect(result.state).toBe('cancelled');
      expect(result.failedStep).toBeUndefined();
      expect(outcome(result.steps, 'a')).toMatchObject({
        state: 'cancelled',
        errorKind: 'AgentInternalError',
        reason: 'workflow cancelled before retry attempt 2 (AgentInternalError: transient)',
        attempts: 1
      });
    });

    it('should refuse to cancel an unknown run', () => {
      expect(coordinator.engine.cancel('no-such-run')).toBe(false);
    });
  });

  describe('planning', () => {
    it('should reject a cyclic workflow before running anything', async () => {
      let calls = 0;
      agentWith(coordinator, 'worker', async () => {
        calls++;
      });

      await expect(coordinator.engine.run(workflow('cycle', [
        step('a', 'worker', { dependsOn: ['b'] }),
        step('b', 'worker', { dependsOn: ['a'] })
      ]), { runId: 'run-cycle' })).rejects.toThrow(ConfigError);

      expect(calls).toBe(0);
      expect(coordinator.auditLog.query({ runId: 'run-cycle' }).map(e => [e.action, e.outcome])).toEqual([
        ['workflow.plan', 'info'],
        ['workflow.plan', 'failure']
      ]);
    });

    it('should reject an invalid concurrency limit', async () => {
      agentWith(coordinator, 'worker', async () => 'ok');

      await expect(coordinator.engine.run(workflow('wf', [step('a', 'worker')]), { maxConcurrent: 0 }))
        .rejects.toThrow('Invalid max concurrency 0 for workflow');
    });
  });

  describe('events and audit', () => {
    it('should emit state transitions and step events', async () => {
      agentWith(coordinator, 'worker', async () => 'ok');
      const states: WorkflowState[] = [];
      const finished: string[] = [];
      coordinator.engine.on('workflow:state', (_runId, state) => states.push(state));
      coordinator.engine.on('step:finished', (_runId, stepOutcome) => finished.push(stepOutcome.stepId));

      await coordinator.engine.run(workflow('events', [step('a', 'worker'), step('b', 'worker', { dependsOn: ['a'] })]));

      expect(states).toEqual(['running', 'completed']);
      expect(finished).toEqual(['a', 'b']);
    });

    it('should leave a complete audit trail for a run', async () => {
      agentWith(coordinator, 'worker', async () => 'ok');

      await coordinator.engine.run(workflow('trail', [step('a', 'worker')]), { runId: 'run-trail' });

      expect(coordinator.auditLog.query({ runId: 'run-trail' }).map(e => e.action)).toEqual([
        'workflow.plan',
        'workflow.start',
        'session.open',
        'agent.invoke',
        'session.close',
        'context.publish',
        'step.finish',
        'workflow.finish'
      ]);
    });
  });
});
