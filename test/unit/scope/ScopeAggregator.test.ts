/**
 * ScopeAggregator Tests
 *
 * Tests:
 * - One complex method downgrades the whole class
 * - Per-method counts and sorted reasons
 * - Annotate mode yields REVIEW-LINEAR scopes
 * - checkScopeInvariant catches inconsistent findings
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { AnalysisError, DEFAULT_CONFIG, checkScopeInvariant, sortedReasons } from '@rewright/core';
import type { RewrightConfig } from '@rewright/types';
import { analyze, lines } from '../../helpers/units.js';

const SAFE_METHOD = [
  `  safe(): void {`,
  `    try {`,
  `      this.tx.begin();`,
  `      this.tx.commit();`,
  `    } catch (e) {`,
  `      this.tx.rollback();`,
  `    }`,
  `  }`,
];

const HEADER = [
  `import { UserTransaction } from '@legacy/container';`,
  `export class Orders {`,
  `  private tx: UserTransaction;`,
];

describe('ScopeAggregator', () => {
  it('should downgrade a class with one complex method', () => {
    const { scopes } = analyze(lines(
      ...HEADER,
      ...SAFE_METHOD,
      `  loose(): void {`,
      `    this.tx.begin();`,
      `  }`,
      `}`
    ));
    assert.strictEqual(scopes.length, 1);
    const { findings } = scopes[0];
    assert.deepStrictEqual(
      {
        scope: findings.scope,
        family: findings.family,
        verdict: findings.verdict,
        linearCount: findings.linearCount,
        complexCount: findings.complexCount,
        reasons: findings.reasons,
        methods: findings.methods,
      },
      {
        scope: 'Orders',
        family: 'transactions',
        verdict: 'REVIEW-COMPLEX',
        linearCount: 1,
        complexCount: 1,
        reasons: ['no-pairing', 'no-rollback-handling'],
        methods: [
          { method: 'loose', verdict: 'REVIEW-COMPLEX', reasons: ['no-pairing', 'no-rollback-handling'] },
          { method: 'safe', verdict: 'SAFE', reasons: [] },
        ],
      }
    );
    assert.doesNotThrow(() => checkScopeInvariant(findings));
  });

  it('should keep an all-safe class SAFE', () => {
    const { scopes } = analyze(lines(...HEADER, ...SAFE_METHOD, `}`));
    const { findings } = scopes[0];
    assert.strictEqual(findings.verdict, 'SAFE');
    assert.strictEqual(findings.linearCount, 1);
    assert.strictEqual(findings.complexCount, 0);
    assert.strictEqual(findings.matches.length, 1);
  });

  it('should count a method as complex when any of its shapes is', () => {
    const { scopes } = analyze(lines(
      ...HEADER,
      `  run(): void {`,
      `    try {`,
      `      this.tx.begin();`,
      `      this.tx.commit();`,
      `    } catch (e) {`,
      `      this.tx.rollback();`,
      `    }`,
      `    this.tx.commit();`,
      `  }`,
      `}`
    ));
    const { findings } = scopes[0];
    assert.deepStrictEqual(findings.matches.map(m => m.classification.verdict), ['SAFE', 'REVIEW-COMPLEX']);
    assert.deepStrictEqual(findings.methods, [{ method: 'run', verdict: 'REVIEW-COMPLEX', reasons: ['no-pairing'] }]);
    assert.strictEqual(findings.linearCount, 0);
    assert.strictEqual(findings.complexCount, 1);
  });

  it('should give REVIEW-LINEAR scopes in annotate mode', () => {
    const config: RewrightConfig = {
      ...DEFAULT_CONFIG,
      families: { ...DEFAULT_CONFIG.families, transactions: { mode: 'annotate' } },
    };
    const { scopes } = analyze(lines(...HEADER, ...SAFE_METHOD, `}`), config);
    const { findings } = scopes[0];
    assert.strictEqual(findings.verdict, 'REVIEW-LINEAR');
    assert.strictEqual(findings.linearCount, 1);
    assert.deepStrictEqual(findings.methods, [{ method: 'safe', verdict: 'REVIEW-LINEAR', reasons: [] }]);
  });

  it('should produce one scope per participating family', () => {
    const { scopes } = analyze(lines(
      `import { UserTransaction, TimerService } from '@legacy/container';`,
      `export class Both {`,
      `  private tx: UserTransaction;`,
      `  private timers: TimerService;`,
      `  run(): void {`,
      `    this.timers.createTimer(10);`,
      `    this.tx.begin();`,
      `  }`,
      `}`
    ));
    assert.deepStrictEqual(scopes.map(s => s.findings.family), ['transactions', 'timers']);
  });
});

describe('checkScopeInvariant', () => {
  it('should reject a SAFE scope holding a complex match', () => {
    const { scopes } = analyze(lines(
      ...HEADER,
      ...SAFE_METHOD,
      `  loose(): void {`,
      `    this.tx.begin();`,
      `  }`,
      `}`
    ));
    const tampered = { ...scopes[0].findings, verdict: 'SAFE' as const };
    assert.throws(
      () => checkScopeInvariant(tampered),
      (err: unknown) => err instanceof AnalysisError && err.code === 'ERR_INVARIANT_VIOLATION'
    );
  });

  it('should reject counts that do not add up to the methods', () => {
    const { scopes } = analyze(lines(...HEADER, ...SAFE_METHOD, `}`));
    const tampered = { ...scopes[0].findings, linearCount: 2 };
    assert.throws(() => checkScopeInvariant(tampered), /Scope Orders \(transactions\) is SAFE but its matches disagree/);
  });
});

describe('sortedReasons', () => {
  it('should deduplicate and sort', () => {
    assert.deepStrictEqual(
      sortedReasons(['unsupported-operation', 'loop-enclosed', 'loop-enclosed']),
      ['loop-enclosed', 'unsupported-operation']
    );
  });
});
