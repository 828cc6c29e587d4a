import { z } from 'zod';

import * as syntax from '../lua-parser/syntax';
import { Random } from '../pipeline/random';
import { Visit, visit } from '../walk/visit';
import { Step, StepContext, defineStep } from './step';

const settings = z
  .object({
    // share of number literals that get rewritten
    threshold: z.number().min(0).max(1).default(1),
    // chance that a generated operand is rewritten again
    internalThreshold: z.number().min(0).max(0.8).default(0.5),
    maxDepth: z.number().int().min(1).max(15).default(5),
  })
  .strict();

type Settings = z.output<typeof settings>;

// A Generator proposes an expression for value, or null when it has none.
type Generator = (value: number, depth: number) => syntax.Expression | null;

// NumbersToExpressions replaces number literals with arithmetic that
// evaluates to the same double.
export class NumbersToExpressions implements Step {
  readonly name = 'NumbersToExpressions';
  private readonly settings: Settings;
  private random = new Random(1);
  private readonly generators: Generator[];

  constructor(s: Settings) {
    this.settings = s;
    this.generators = [
      (value, depth) => {
        const r = this.random.int(-1000, 1000);
        return binary('+', this.create(r, depth), this.create(value - r, depth));
      },
      (value, depth) => {
        const r = this.random.int(-1000, 1000);
        return binary('-', this.create(value + r, depth), this.create(r, depth));
      },
      (value, depth) => {
        const factor = this.random.int(2, 5);
        if (value === 0 || !Number.isInteger(value / factor)) {
          return null;
        }
        return binary('*', this.create(factor, depth), this.create(value / factor, depth));
      },
      (value, depth) => {
        const factor = this.random.int(2, 5);
        return binary('/', this.create(value * factor, depth), this.create(factor, depth));
      },
      (value, depth) => {
        // (c == c) and value or junk
        const c = this.random.int(1, 100);
        const junk = this.random.int(-5000, 5000);
        const cond = binary('==', this.create(c, depth), this.create(c, depth));
        return binary('or', binary('and', cond, this.create(value, depth)), this.create(junk, depth));
      },
      (value, depth) => {
        return new syntax.UnaryExpression('-', new syntax.UnaryExpression('-', this.create(value, depth)));
      },
    ];
  }

  apply(chunk: syntax.Chunk, ctx: StepContext): void {
    this.random = ctx.random;
    let count = 0;
    visit(chunk, {
      post: (node) => {
        if (node.kind !== syntax.NodeKind.NumberExpression || node.hasTag(syntax.NodeTag.Exempt)) {
          return undefined;
        }
        if (!Number.isFinite(node.value) || !this.random.chance(this.settings.threshold)) {
          return undefined;
        }
        const expr = this.create(node.value, 0);
        if (expr.kind === syntax.NodeKind.NumberExpression) {
          return undefined;
        }
        count++;
        return Visit.replace(expr);
      },
    });
    ctx.logger.debug(`rewrote ${count} number literals`);
  }

  // create returns an expression for value. Candidates are checked in
  // double arithmetic; a literal is the fallback.
  private create(value: number, depth: number): syntax.Expression {
    const stop =
      depth > this.settings.maxDepth || (depth > 0 && this.random.float() >= this.settings.internalThreshold);
    if (!stop) {
      for (const generate of this.random.shuffle(this.generators)) {
        const expr = generate(value, depth + 1);
        if (expr !== null && Object.is(evaluate(expr), value)) {
          return expr;
        }
      }
    }
    return new syntax.NumberExpression(value, syntax.NodeTags.generated);
  }
}

function binary(op: syntax.BinaryOperator, lhs: syntax.Expression, rhs: syntax.Expression): syntax.BinaryExpression {
  return new syntax.BinaryExpression(op, lhs, rhs, syntax.NodeTags.generated);
}

// evaluate computes a constant expression the way Lua 5.1 does, or
// returns undefined for anything it does not model.
export function evaluate(e: syntax.Expression): number | boolean | undefined {
  switch (e.kind) {
    case syntax.NodeKind.NumberExpression:
      return e.value;
    case syntax.NodeKind.BooleanExpression:
      return e.value;
    case syntax.NodeKind.ParenthesizedExpression:
      return evaluate(e.expression);
    case syntax.NodeKind.UnaryExpression: {
      const v = evaluate(e.operand);
      if (e.op === '-' && typeof v === 'number') {
        return -v;
      }
      if (e.op === 'not' && v !== undefined) {
        return v === false;
      }
      return undefined;
    }
    case syntax.NodeKind.BinaryExpression: {
      const l = evaluate(e.lhs);
      if (l === undefined) {
        return undefined;
      }
      // numbers are always truthy
      if (e.op === 'and') {
        return l === false ? l : evaluate(e.rhs);
      }
      if (e.op === 'or') {
        return l === false ? evaluate(e.rhs) : l;
      }
      const r = evaluate(e.rhs);
      if (typeof l !== 'number' || typeof r !== 'number') {
        return e.op === '==' && r !== undefined ? l === r : undefined;
      }
      return arith(e.op, l, r);
    }
    default:
      return undefined;
  }
}

function arith(op: syntax.BinaryOperator, l: number, r: number): number | boolean | undefined {
  switch (op) {
    case '+':
      return l + r;
    case '-':
      return l - r;
    case '*':
      return l * r;
    case '/':
      return l / r;
    case '%':
      return l - Math.floor(l / r) * r;
    case '^':
      return Math.pow(l, r);
    case '==':
      return l === r;
    case '~=':
      return l !== r;
    case '<':
      return l < r;
    case '<=':
      return l <= r;
    case '>':
      return l > r;
    case '>=':
      return l >= r;
    default:
      return undefined;
  }
}

export const numbersToExpressions = defineStep({
  name: 'NumbersToExpressions',
  description: 'replaces number literals with equivalent arithmetic',
  settings,
  create: (s) => new NumbersToExpressions(s),
});
