/**
 * FactCollector Tests
 *
 * Tests:
 * - Tracked calls through fields, factories, locals and parameters
 * - Statement frames, loop and deferred flags, value use
 * - Escaping references recorded as 'other' / 'configure'
 * - this.f, this['f'], self.f, const { f } = this and parameter properties share one alias
 * - Look-alike types ignored; untyped receivers recorded UNRESOLVED
 * - Diagnostics for unresolved receivers and code outside classes
 * - Class facts: fields, parameter properties, timeout handlers, existing markers
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { classifyShapes, collect, lines } from '../../helpers/units.js';

// =============================================================================
// TESTS: transaction occurrences
// =============================================================================

describe('FactCollector', () => {
  describe('transaction occurrences', () => {
    const code = lines(
      `import { UserTransaction, SessionContext } from '@legacy/container';`,
      ``,
      `export class Orders {`,
      `  private tx: UserTransaction;`,
      `  private ctx: SessionContext;`,
      ``,
      `  place(): void {`,
      `    this.tx.begin();`,
      `    for (const item of [1, 2]) {`,
      `      this.tx.commit();`,
      `    }`,
      `  }`,
      ``,
      `  viaFactory(): void {`,
      `    const ut = this.ctx.getUserTransaction();`,
      `    ut.begin();`,
      `    setTimeout(() => ut.rollback());`,
      `  }`,
      ``,
      `  leak(): UserTransaction {`,
      `    return this.tx;`,
      `  }`,
      `}`
    );

    it('should record every use in source order', () => {
      const { facts } = collect(code);
      assert.deepStrictEqual(
        facts.occurrences.map(o => ({ id: o.id, op: o.op, member: o.member, alias: o.alias, method: o.method })),
        [
          { id: 0, op: 'begin', member: 'begin', alias: 'field:tx', method: 'place' },
          { id: 1, op: 'commit', member: 'commit', alias: 'field:tx', method: 'place' },
          { id: 2, op: 'begin', member: 'begin', alias: 'factory:field:ctx#getUserTransaction', method: 'viaFactory' },
          { id: 3, op: 'rollback', member: 'rollback', alias: 'factory:field:ctx#getUserTransaction', method: 'viaFactory' },
          { id: 4, op: 'other', member: '<reference>', alias: 'field:tx', method: 'leak' },
        ]
      );
      assert.ok(facts.occurrences.every(o => o.family === 'transactions' && o.resolution === 'RESOLVED' && o.scope === 'Orders'));
    });

    it('should record frames, flags and positions', () => {
      const { facts } = collect(code);
      assert.deepStrictEqual(
        facts.occurrences.map(o => [o.frames, o.inLoop, o.deferred, o.valueUsed, o.position]),
        [
          [['plain'], false, false, false, { line: 8, column: 4 }],
          [['loop-body'], true, false, false, { line: 10, column: 6 }],
          [['plain'], false, false, false, { line: 16, column: 4 }],
          [['nested-function'], false, true, true, { line: 17, column: 21 }],
          [['plain'], false, false, true, { line: 21, column: 11 }],
        ]
      );
    });

    it('should take snippets from the statement or the expression', () => {
      const { facts } = collect(code);
      assert.deepStrictEqual(facts.occurrences.map(o => o.snippet), [
        'this.tx.begin();',
        'this.tx.commit();',
        'ut.begin();',
        'ut.rollback()',
        'this.tx',
      ]);
    });

    it('should build the alias table with local hops', () => {
      const { facts } = collect(code);
      assert.deepStrictEqual([...facts.aliases.keys()], ['field:tx', 'factory:field:ctx#getUserTransaction']);
      const field = facts.aliases.get('field:tx');
      assert.deepStrictEqual(field?.occurrences, [0, 1, 4]);
      assert.strictEqual(field?.kind, 'field');
      const factory = facts.aliases.get('factory:field:ctx#getUserTransaction');
      assert.deepStrictEqual(factory?.occurrences, [2, 3]);
      assert.strictEqual(factory?.hops.length, 1);
    });
  });

  // ===========================================================================
  // TESTS: resolution
  // ===========================================================================

  describe('resolution', () => {
    const code = lines(
      `import { UserTransaction } from '@legacy/container';`,
      `class Local { begin(): void {} }`,
      `export class Mixed {`,
      `  private local: Local;`,
      `  handle(tx, other: Local): void {`,
      `    this.local.begin();`,
      `    other.begin();`,
      `    tx.begin();`,
      `  }`,
      `}`,
      `export function helper(tx: UserTransaction): void {`,
      `  tx.commit();`,
      `}`
    );

    it('should ignore receivers typed as look-alikes', () => {
      const { facts } = collect(code);
      assert.deepStrictEqual(facts.occurrences.map(o => o.position.line), [8, 12]);
    });

    it('should record an untyped receiver as UNRESOLVED', () => {
      const { facts } = collect(code);
      const [untyped] = facts.occurrences;
      assert.strictEqual(untyped.resolution, 'UNRESOLVED');
      assert.strictEqual(untyped.alias, null);
      assert.strictEqual(untyped.op, 'begin');
    });

    it('should resolve parameters outside classes without a scope', () => {
      const { facts } = collect(code);
      const outside = facts.occurrences[1];
      assert.strictEqual(outside.alias, 'param:<unit>:tx');
      assert.strictEqual(outside.scope, null);
      assert.strictEqual(outside.method, null);
    });

    it('should report both conditions as diagnostics', () => {
      const { context } = collect(code);
      assert.deepStrictEqual(
        context.diagnostics.getAll().map(d => [d.code, d.severity, d.message, d.line, d.phase]),
        [
          ['WARN_UNRESOLVED_RECEIVER', 'warning', 'Cannot resolve the receiver type of begin() at src/Subject.ts:8:4', 8, 'COLLECT'],
          ['WARN_OUTSIDE_SCOPE', 'warning', 'Tracked commit at src/Subject.ts:12:2 is outside any class declaration', 12, 'COLLECT'],
        ]
      );
    });
  });

  // ===========================================================================
  // TESTS: timer occurrences
  // ===========================================================================

  describe('timer occurrences', () => {
    it('should link creation calls to their configuration', () => {
      const { facts } = collect(lines(
        `import { TimerService, TimerConfig } from '@legacy/container';`,
        `export class Jobs {`,
        `  private timers: TimerService;`,
        `  start(): void {`,
        `    const config = new TimerConfig('nightly', false);`,
        `    config.setInfo('x');`,
        `    this.timers.createTimer(1000, config);`,
        `    this.timers.createIntervalTimer(0, 500, new TimerConfig(null, true));`,
        `    this.timers.createTimer(1000, 'info');`,
        `  }`,
        `}`
      ));
      assert.deepStrictEqual(
        facts.occurrences.map(o => [o.op, o.member, o.alias, o.config ?? null]),
        [
          ['construct-config', '<new>', 'construct:5:19', null],
          ['configure', 'setInfo', 'construct:5:19', null],
          ['create-timer', 'createTimer', 'field:timers', { kind: 'traced', alias: 'construct:5:19' }],
          ['create-interval-timer', 'createIntervalTimer', 'field:timers', { kind: 'traced', alias: 'construct:8:44' }],
          ['construct-config', '<new>', 'construct:8:44', null],
          ['create-timer', 'createTimer', 'field:timers', { kind: 'not-config', alias: null }],
        ]
      );
      assert.deepStrictEqual(facts.occurrences[0].args.map(a => [a.literalness, a.value]), [
        ['LITERAL', 'nightly'],
        ['LITERAL', false],
      ]);
    });

    it('should record configuration mutation and escape', () => {
      const { facts } = collect(lines(
        `import { TimerService, TimerConfig } from '@legacy/container';`,
        `export class Jobs {`,
        `  private timers: TimerService;`,
        `  start(): void {`,
        `    const config = new TimerConfig(null, false);`,
        `    config.info = 'nightly';`,
        `    this.timers.createTimer(1000, config);`,
        `    this.remember(config);`,
        `  }`,
        `  remember(value: unknown): void {}`,
        `}`
      ));
      assert.deepStrictEqual(facts.occurrences.map(o => [o.op, o.member]), [
        ['construct-config', '<new>'],
        ['configure', 'info'],
        ['create-timer', 'createTimer'],
        ['configure', '<escape>'],
      ]);
    });
  });

  // ===========================================================================
  // TESTS: receiver qualification
  // ===========================================================================

  describe('receiver qualification', () => {
    const code = lines(
      `import { UserTransaction } from '@legacy/container';`,
      `export class Orders {`,
      `  constructor(private readonly tx: UserTransaction) {`,
      `    try {`,
      `      tx.begin();`,
      `      this.work();`,
      `      this['tx'].commit();`,
      `    } catch (e) {`,
      `      this.tx.rollback();`,
      `    }`,
      `  }`,
      `  place(): void {`,
      `    const self = this;`,
      `    const { tx } = this;`,
      `    try {`,
      `      self.tx.begin();`,
      `      this.work();`,
      `      tx.commit();`,
      `    } catch (e) {`,
      `      this['tx'].rollback();`,
      `    }`,
      `  }`,
      `  work(): void {}`,
      `}`
    );

    it('should reduce every way of reaching the field to one alias', () => {
      const { facts } = collect(code);
      assert.deepStrictEqual(
        facts.occurrences.map(o => [o.op, o.alias, o.method]),
        [
          ['begin', 'field:tx', 'constructor'],
          ['commit', 'field:tx', 'constructor'],
          ['rollback', 'field:tx', 'constructor'],
          ['begin', 'field:tx', 'place'],
          ['commit', 'field:tx', 'place'],
          ['rollback', 'field:tx', 'place'],
        ]
      );
      assert.deepStrictEqual([...facts.aliases.keys()], ['field:tx']);
    });

    it('should classify both blocks as SAFE', () => {
      const shapes = classifyShapes(code, 'transactions');
      assert.deepStrictEqual(
        shapes.map(s => [s.method, s.tags, s.classification.verdict]),
        [
          ['constructor', ['LINEAR'], 'SAFE'],
          ['place', ['LINEAR'], 'SAFE'],
        ]
      );
    });
  });

  // ===========================================================================
  // TESTS: class facts
  // ===========================================================================

  describe('class facts', () => {
    it('should collect fields, handlers and existing markers', () => {
      const { facts } = collect(lines(
        `import { Timeout, TimerService, UserTransaction } from '@legacy/container';`,
        `import { NeedsReview as Review } from '@platform/migration';`,
        ``,
        `@Review({ category: 'SCHEDULING', reason: 'r' })`,
        `@Review('older schema')`,
        `export class Reports {`,
        `  constructor(private readonly timers: TimerService, public tx?: UserTransaction) {}`,
        `  @Timeout()`,
        `  onTimeout(): void {}`,
        `  #refresh(): void {}`,
        `}`
      ));
      assert.strictEqual(facts.markerLocalName, 'Review');
      const [owner] = facts.classes;
      assert.strictEqual(owner.name, 'Reports');
      assert.deepStrictEqual(
        [...owner.fields.values()].map(f => [f.name, f.type, f.kind]),
        [['timers', 'TimerService', 'parameter'], ['tx', 'UserTransaction', 'parameter']]
      );
      assert.deepStrictEqual(owner.methods.map(m => m.name), ['onTimeout', '#refresh']);
      assert.deepStrictEqual(owner.timeoutHandlers.map(h => [h.method, h.paramCount]), [['onTimeout', 0]]);
      assert.deepStrictEqual(owner.markers.map(m => [m.category, m.legacy]), [['SCHEDULING', false], [null, true]]);
    });

    it('should derive the declaration id from file, name and line', () => {
      const { facts } = collect(lines(
        `import { UserTransaction } from '@legacy/container';`,
        ``,
        `export class Ledger {`,
        `  private tx = new UserTransaction();`,
        `  private readonly label = 'ledger';`,
        `}`
      ), 'src/ledger/Ledger.ts');
      const [owner] = facts.classes;
      assert.strictEqual(owner.declarationId, 'src/ledger/Ledger.ts#Ledger@3');
      assert.deepStrictEqual(
        [...owner.fields.values()].map(f => [f.name, f.type, f.annotated]),
        [['tx', 'UserTransaction', true], ['label', null, false]]
      );
      assert.strictEqual(owner.statement.isExportNamedDeclaration(), true);
    });
  });
});
