/**
 * TimerRewriter Tests
 *
 * Tests:
 * - Single timers become TaskScheduler.schedule calls on the timeout handler
 * - Interval timers become scheduleAtFixedRate with a parenthesized delay
 * - Configuration locals and fields used only by the creation call are dropped
 * - The @Timeout decorator and legacy imports go
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { Rewriter, scheduleCall } from '@rewright/core';
import { analyze, collect, lines } from '../../helpers/units.js';

function rewrite(code: string): string {
  const { facts, context, scopes } = analyze(code);
  assert.deepStrictEqual(scopes.map(s => s.findings.verdict), ['SAFE']);
  return new Rewriter(context).rewrite(facts, scopes).code;
}

describe('TimerRewriter', () => {
  it('should schedule the timeout handler and drop the configuration', () => {
    const output = rewrite(lines(
      `import { Timeout, TimerService, TimerConfig } from '@legacy/container';`,
      ``,
      `export class Reminders {`,
      `  private timers: TimerService;`,
      ``,
      `  schedule(): void {`,
      `    const config = new TimerConfig(null, false);`,
      `    this.timers.createTimer(5000, config);`,
      `  }`,
      ``,
      `  @Timeout()`,
      `  onTimeout(): void {`,
      `    this.send();`,
      `  }`,
      ``,
      `  private send(): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { TaskScheduler } from '@platform/scheduling';`,
      ``,
      `export class Reminders {`,
      `  private taskScheduler: TaskScheduler;`,
      ``,
      `  schedule(): void {`,
      `    this.taskScheduler.schedule(() => this.onTimeout(), new Date(Date.now() + 5000));`,
      `  }`,
      ``,
      `  onTimeout(): void {`,
      `    this.send();`,
      `  }`,
      ``,
      `  private send(): void {}`,
      `}`
    ));
  });

  it('should rewrite interval timers configured through a field', () => {
    const output = rewrite(lines(
      `import { Timeout, TimerService, TimerConfig } from '@legacy/container';`,
      ``,
      `const WARMUP = 1000;`,
      ``,
      `export class Poller {`,
      `  private config = new TimerConfig('poll', false);`,
      `  constructor(private readonly timers: TimerService) {}`,
      ``,
      `  start(): void {`,
      `    this.timers.createIntervalTimer(WARMUP * 2, 500, this.config);`,
      `  }`,
      ``,
      `  @Timeout()`,
      `  poll(): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { TaskScheduler } from '@platform/scheduling';`,
      ``,
      `const WARMUP = 1000;`,
      ``,
      `export class Poller {`,
      `  constructor(private readonly taskScheduler: TaskScheduler) {}`,
      ``,
      `  start(): void {`,
      `    this.taskScheduler.scheduleAtFixedRate(() => this.poll(), new Date(Date.now() + (WARMUP * 2)), 500);`,
      `  }`,
      ``,
      `  poll(): void {}`,
      `}`
    ));
  });
});

describe('scheduleCall', () => {
  it('should keep simple delays bare', () => {
    const code = lines(
      `import { TimerService, TimerConfig } from '@legacy/container';`,
      `export class Jobs {`,
      `  private timers: TimerService;`,
      `  private readonly delay = 250;`,
      `  start(): void {`,
      `    this.timers.createSingleActionTimer(this.delay, new TimerConfig(null, false));`,
      `  }`,
      `}`
    );
    const { facts } = collect(code);
    const create = facts.occurrences[0];
    assert.strictEqual(create.op, 'create-single-action-timer');
    assert.strictEqual(
      scheduleCall(create, 'fire', code),
      'this.taskScheduler.schedule(() => this.fire(), new Date(Date.now() + this.delay))'
    );
  });
});
