/**
 * TransactionRewriter Tests
 *
 * Tests:
 * - Linear try block becomes an executeWithoutResult callback
 * - Awaited calls give an async callback
 * - Nested rollback try removed together with the rollback, unless it has a finally block
 * - Local `const self = this` removed once its uses are rewritten
 * - Parameter properties, local aliases and factory-sourced resources
 * - Imports swapped
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';

import { Rewriter } from '@rewright/core';
import { analyze, lines } from '../../helpers/units.js';

function rewrite(code: string): string {
  const { facts, context, scopes } = analyze(code);
  assert.deepStrictEqual(scopes.map(s => s.findings.verdict), ['SAFE']);
  return new Rewriter(context).rewrite(facts, scopes).code;
}

describe('TransactionRewriter', () => {
  it('should wrap the unit of work and inject the template', () => {
    const output = rewrite(lines(
      `import { UserTransaction } from '@legacy/container';`,
      ``,
      `export class PaymentService {`,
      `  private tx: UserTransaction;`,
      ``,
      `  pay(amount: number): void {`,
      `    try {`,
      `      this.tx.begin();`,
      `      this.debit(amount);`,
      `      this.credit(amount);`,
      `      this.tx.commit();`,
      `    } catch (e) {`,
      `      this.tx.rollback();`,
      `      throw e;`,
      `    }`,
      `  }`,
      ``,
      `  private debit(amount: number): void {}`,
      `  private credit(amount: number): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { TransactionTemplate } from '@platform/transactions';`,
      ``,
      `export class PaymentService {`,
      `  private transactionTemplate: TransactionTemplate;`,
      ``,
      `  pay(amount: number): void {`,
      `    try {`,
      `      this.transactionTemplate.executeWithoutResult(() => {`,
      `        this.debit(amount);`,
      `        this.credit(amount);`,
      `      });`,
      `    } catch (e) {`,
      `      throw e;`,
      `    }`,
      `  }`,
      ``,
      `  private debit(amount: number): void {}`,
      `  private credit(amount: number): void {}`,
      `}`
    ));
  });

  it('should produce an awaited async callback and drop a nested rollback try', () => {
    const output = rewrite(lines(
      `import { UserTransaction } from '@legacy/container';`,
      `import { Repository } from './Repository';`,
      ``,
      `export class Orders {`,
      `  constructor(private readonly repo: Repository, private readonly tx: UserTransaction) {}`,
      ``,
      `  async save(): Promise<void> {`,
      `    try {`,
      `      await this.tx.begin();`,
      `      await this.repo.save();`,
      `      await this.tx.commit();`,
      `    } catch (e) {`,
      `      try {`,
      `        await this.tx.rollback();`,
      `      } catch (ignored) {`,
      `        this.repo.reset();`,
      `      }`,
      `    }`,
      `  }`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { Repository } from './Repository';`,
      `import { TransactionTemplate } from '@platform/transactions';`,
      ``,
      `export class Orders {`,
      `  constructor(private readonly repo: Repository, private readonly transactionTemplate: TransactionTemplate) {}`,
      ``,
      `  async save(): Promise<void> {`,
      `    try {`,
      `      await this.transactionTemplate.executeWithoutResult(async () => {`,
      `        await this.repo.save();`,
      `      });`,
      `    } catch (e) {`,
      `    }`,
      `  }`,
      `}`
    ));
  });

  it('should remove a local alias of the field', () => {
    const output = rewrite(lines(
      `import { UserTransaction } from '@legacy/container';`,
      ``,
      `export class Orders {`,
      `  private tx: UserTransaction;`,
      ``,
      `  place(): void {`,
      `    const ut = this.tx;`,
      `    try {`,
      `      ut.begin();`,
      `      this.work();`,
      `      ut.commit();`,
      `    } catch (e) {`,
      `      ut.rollback();`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { TransactionTemplate } from '@platform/transactions';`,
      ``,
      `export class Orders {`,
      `  private transactionTemplate: TransactionTemplate;`,
      ``,
      `  place(): void {`,
      `    try {`,
      `      this.transactionTemplate.executeWithoutResult(() => {`,
      `        this.work();`,
      `      });`,
      `    } catch (e) {`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));
  });

  it('should add the template field when the resource came from a factory', () => {
    const output = rewrite(lines(
      `import { SessionContext } from '@legacy/container';`,
      ``,
      `export class Orders {`,
      `  private ctx: SessionContext;`,
      ``,
      `  place(): void {`,
      `    const ut = this.ctx.getUserTransaction();`,
      `    try {`,
      `      ut.begin();`,
      `      this.work();`,
      `      ut.commit();`,
      `    } catch (e) {`,
      `      ut.rollback();`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { SessionContext } from '@legacy/container';`,
      `import { TransactionTemplate } from '@platform/transactions';`,
      ``,
      `export class Orders {`,
      `  private readonly transactionTemplate!: TransactionTemplate;`,
      `  private ctx: SessionContext;`,
      ``,
      `  place(): void {`,
      `    try {`,
      `      this.transactionTemplate.executeWithoutResult(() => {`,
      `        this.work();`,
      `      });`,
      `    } catch (e) {`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));
  });

  it('should keep a nested try that has a finally block', () => {
    const output = rewrite(lines(
      `import { UserTransaction } from '@legacy/container';`,
      ``,
      `export class PaymentService {`,
      `  private tx: UserTransaction;`,
      ``,
      `  pay(): void {`,
      `    try {`,
      `      this.tx.begin();`,
      `      this.debit();`,
      `      this.tx.commit();`,
      `    } catch (e) {`,
      `      try {`,
      `        this.tx.rollback();`,
      `      } finally {`,
      `        this.cleanup();`,
      `      }`,
      `    }`,
      `  }`,
      ``,
      `  private debit(): void {}`,
      `  private cleanup(): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { TransactionTemplate } from '@platform/transactions';`,
      ``,
      `export class PaymentService {`,
      `  private transactionTemplate: TransactionTemplate;`,
      ``,
      `  pay(): void {`,
      `    try {`,
      `      this.transactionTemplate.executeWithoutResult(() => {`,
      `        this.debit();`,
      `      });`,
      `    } catch (e) {`,
      `      try {`,
      `      } finally {`,
      `        this.cleanup();`,
      `      }`,
      `    }`,
      `  }`,
      ``,
      `  private debit(): void {}`,
      `  private cleanup(): void {}`,
      `}`
    ));
  });

  it('should remove a this alias used only to reach the resource', () => {
    const output = rewrite(lines(
      `import { UserTransaction } from '@legacy/container';`,
      ``,
      `export class Orders {`,
      `  private tx: UserTransaction;`,
      ``,
      `  place(): void {`,
      `    const self = this;`,
      `    try {`,
      `      self.tx.begin();`,
      `      this.work();`,
      `      self.tx.commit();`,
      `    } catch (e) {`,
      `      self.tx.rollback();`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { TransactionTemplate } from '@platform/transactions';`,
      ``,
      `export class Orders {`,
      `  private transactionTemplate: TransactionTemplate;`,
      ``,
      `  place(): void {`,
      `    try {`,
      `      this.transactionTemplate.executeWithoutResult(() => {`,
      `        this.work();`,
      `      });`,
      `    } catch (e) {`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));
  });

  it('should keep a this alias that is still used', () => {
    const output = rewrite(lines(
      `import { UserTransaction } from '@legacy/container';`,
      ``,
      `export class Orders {`,
      `  private tx: UserTransaction;`,
      ``,
      `  place(): void {`,
      `    const self = this;`,
      `    try {`,
      `      self.tx.begin();`,
      `      self.work();`,
      `      self.tx.commit();`,
      `    } catch (e) {`,
      `      self.tx.rollback();`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));

    assert.strictEqual(output, lines(
      `import { TransactionTemplate } from '@platform/transactions';`,
      ``,
      `export class Orders {`,
      `  private transactionTemplate: TransactionTemplate;`,
      ``,
      `  place(): void {`,
      `    const self = this;`,
      `    try {`,
      `      this.transactionTemplate.executeWithoutResult(() => {`,
      `        self.work();`,
      `      });`,
      `    } catch (e) {`,
      `    }`,
      `  }`,
      ``,
      `  private work(): void {}`,
      `}`
    ));
  });
});
