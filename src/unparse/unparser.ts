import { SymbolId } from '../resolve/binding';
import { Scope } from '../resolve/scope';
import * as syntax from '../lua-parser/syntax';
import { isReserved } from '../lua-parser/tokenize/token';

export interface UnparseOptions {
  // one statement per line with tab indentation; default is one line
  pretty?: boolean;
}

// Operator precedence, loosest first. Prefix expressions bind tightest.
enum Prec {
  Lowest = 0,
  Or = 1,
  And = 2,
  Compare = 3,
  Concat = 4,
  Add = 5,
  Mul = 6,
  Unary = 7,
  Pow = 8,
  Primary = 9,
}

const binaryPrec: Record<syntax.BinaryOperator, Prec> = {
  or: Prec.Or,
  and: Prec.And,
  '<': Prec.Compare,
  '>': Prec.Compare,
  '<=': Prec.Compare,
  '>=': Prec.Compare,
  '~=': Prec.Compare,
  '==': Prec.Compare,
  '..': Prec.Concat,
  '+': Prec.Add,
  '-': Prec.Add,
  '*': Prec.Mul,
  '/': Prec.Mul,
  '%': Prec.Mul,
  '^': Prec.Pow,
};

function isRightAssociative(op: syntax.BinaryOperator): boolean {
  return op === '..' || op === '^';
}

// isIdentifier reports whether s can be written as a bare name.
export function isIdentifier(s: string): boolean {
  return /^[A-Za-z_][A-Za-z0-9_]*$/.test(s) && !isReserved(s);
}

// luaString quotes s, one char per byte, as a double quoted literal.
export function luaString(s: string): string {
  let out = '"';
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    switch (c) {
      case 0x5c:
        out += '\\\\';
        break;
      case 0x22:
        out += '\\"';
        break;
      case 0x0a:
        out += '\\n';
        break;
      case 0x0d:
        out += '\\r';
        break;
      case 0x09:
        out += '\\t';
        break;
      default:
        if (c >= 0x20 && c < 0x7f) {
          out += s[i];
        } else {
          // always three digits, so a following digit is not absorbed
          out += '\\' + String(c).padStart(3, '0');
        }
    }
  }
  return out + '"';
}

// luaNumber writes n as a Lua numeric expression.
export function luaNumber(n: number): string {
  if (Number.isNaN(n)) {
    return '(0/0)';
  }
  if (n === Infinity) {
    return '(1/0)';
  }
  if (n === -Infinity) {
    return '(-1/0)';
  }
  if (Object.is(n, -0)) {
    return '-0';
  }
  return String(n);
}

// unparse writes a tree back out as Lua source text. Every variable is
// written with its scope's current name for it.
export function unparse(chunk: syntax.Chunk, options: UnparseOptions = {}): string {
  return new Unparser(options).chunk(chunk);
}

// Unparser is a precedence aware printer. It adds the parentheses the
// tree's shape needs and no others; ParenthesizedExpression nodes are
// always kept, since they truncate multiple values.
export class Unparser {
  private readonly pretty: boolean;
  private depth = 0;

  constructor(options: UnparseOptions = {}) {
    this.pretty = options.pretty ?? false;
  }

  chunk(c: syntax.Chunk): string {
    return this.statements(c.body.statements).join(this.pretty ? '\n' : '; ');
  }

  private indent(): string {
    return this.pretty ? '\t'.repeat(this.depth) : '';
  }

  // statements writes a statement list at the current depth. A return,
  // break or continue that is not last is wrapped in do ... end.
  private statements(stmts: syntax.Statement[]): string[] {
    const ind = this.indent();
    return stmts.map((s, i) => {
      let text = this.statement(s);
      if (syntax.isLastStatement(s) && i < stmts.length - 1) {
        text = `do ${text} end`;
      }
      // a line starting with '(' would continue the previous call
      if (this.pretty && i > 0 && text.startsWith('(')) {
        text = ';' + text;
      }
      return ind + text;
    });
  }

  // block writes head, the block's statements and tail.
  private block(head: string, b: syntax.Block, tail: string): string {
    this.depth++;
    const body = this.statements(b.statements);
    this.depth--;
    if (!this.pretty) {
      return body.length === 0 ? `${head} ${tail}` : `${head} ${body.join('; ')} ${tail}`;
    }
    return [head, ...body, this.indent() + tail].join('\n');
  }

  private name(scope: Scope, id: SymbolId): string {
    return scope.getVariableName(id);
  }

  statement(s: syntax.Statement): string {
    switch (s.kind) {
      case syntax.NodeKind.LocalVariableDeclaration: {
        const names = s.ids.map((id) => this.name(s.scope, id)).join(', ');
        if (s.expressions.length === 0) {
          return `local ${names}`;
        }
        return `local ${names} = ${this.exprList(s.expressions)}`;
      }
      case syntax.NodeKind.LocalFunctionDeclaration:
        return this.functionBody(`local function ${this.name(s.scope, s.id)}`, s.params, s.body);
      case syntax.NodeKind.FunctionDeclaration: {
        const path = [this.name(s.scope, s.id), ...s.indices].join('.');
        const simple = s.indices.every(isIdentifier);
        if (simple) {
          return this.functionBody(`function ${path}`, s.params, s.body);
        }
        // an index that is no identifier can only be written as an assignment
        let target = this.name(s.scope, s.id);
        for (const index of s.indices) {
          target += `[${luaString(index)}]`;
        }
        return `${target} = ${this.functionBody('function', s.params, s.body)}`;
      }
      case syntax.NodeKind.AssignmentStatement:
        return `${s.lhs.map((t) => this.target(t)).join(', ')} = ${this.exprList(s.rhs)}`;
      case syntax.NodeKind.CompoundAssignmentStatement:
        return `${this.target(s.lhs)} ${s.op}= ${this.expr(s.rhs)}`;
      case syntax.NodeKind.FunctionCallStatement:
        return `${this.prefix(s.base)}(${this.exprList(s.args)})`;
      case syntax.NodeKind.PassSelfFunctionCallStatement:
        return `${this.prefix(s.base)}:${s.passSelfFunctionName}(${this.exprList(s.args)})`;
      case syntax.NodeKind.ReturnStatement:
        return s.args.length === 0 ? 'return' : `return ${this.exprList(s.args)}`;
      case syntax.NodeKind.DoStatement:
        return this.block('do', s.body, 'end');
      case syntax.NodeKind.WhileStatement:
        return this.block(`while ${this.expr(s.condition)} do`, s.body, 'end');
      case syntax.NodeKind.RepeatStatement:
        return this.block('repeat', s.body, `until ${this.expr(s.condition)}`);
      case syntax.NodeKind.ForStatement: {
        let head = `for ${this.name(s.scope, s.id)} = ${this.expr(s.initialValue)}, ${this.expr(s.finalValue)}`;
        if (s.incrementBy !== null) {
          head += `, ${this.expr(s.incrementBy)}`;
        }
        return this.block(`${head} do`, s.body, 'end');
      }
      case syntax.NodeKind.ForInStatement: {
        const names = s.ids.map((id) => this.name(s.scope, id)).join(', ');
        return this.block(`for ${names} in ${this.exprList(s.expressions)} do`, s.body, 'end');
      }
      case syntax.NodeKind.IfStatement:
        return this.ifStatement(s);
      case syntax.NodeKind.BreakStatement:
        return 'break';
      case syntax.NodeKind.ContinueStatement:
        return 'continue';
    }
  }

  private ifStatement(s: syntax.IfStatement): string {
    // each clause's tail is the head of the next one
    const heads = [`if ${this.expr(s.condition)} then`];
    const bodies = [s.body];
    for (const clause of s.elseifs) {
      heads.push(`elseif ${this.expr(clause.condition)} then`);
      bodies.push(clause.body);
    }
    if (s.elseBody !== null) {
      heads.push('else');
      bodies.push(s.elseBody);
    }
    let out = '';
    for (let i = 0; i < heads.length; i++) {
      out += this.block(heads[i], bodies[i], i === heads.length - 1 ? 'end' : '');
    }
    return out;
  }

  private target(t: syntax.AssignmentTarget): string {
    if (t.kind === syntax.NodeKind.AssignmentVariable) {
      return this.name(t.scope, t.id);
    }
    return this.prefix(t.base) + this.index(t.index);
  }

  private index(index: syntax.Expression): string {
    if (index.kind === syntax.NodeKind.StringExpression && isIdentifier(index.value)) {
      return `.${index.value}`;
    }
    return `[${this.expr(index)}]`;
  }

  private functionBody(head: string, params: syntax.FunctionParameter[], body: syntax.Block): string {
    const list = params
      .map((p) => (p.kind === syntax.NodeKind.VarargExpression ? '...' : this.name(p.scope, p.id)))
      .join(', ');
    return this.block(`${head}(${list})`, body, 'end');
  }

  private exprList(es: syntax.Expression[]): string {
    return es.map((e) => this.expr(e)).join(', ');
  }

  // prefix writes e where only a prefix expression may stand: as the
  // base of a call or an index.
  private prefix(e: syntax.Expression): string {
    switch (e.kind) {
      case syntax.NodeKind.VariableExpression:
      case syntax.NodeKind.IndexExpression:
      case syntax.NodeKind.FunctionCallExpression:
      case syntax.NodeKind.PassSelfFunctionCallExpression:
      case syntax.NodeKind.ParenthesizedExpression:
        return this.expr(e);
      default:
        return `(${this.expr(e)})`;
    }
  }

  // precedence returns how tightly the written form of e binds.
  private precedence(e: syntax.Expression): Prec {
    switch (e.kind) {
      case syntax.NodeKind.BinaryExpression:
        return binaryPrec[e.op];
      case syntax.NodeKind.UnaryExpression:
        return Prec.Unary;
      case syntax.NodeKind.NumberExpression:
        // a negative literal is written with a leading minus
        return e.value < 0 || Object.is(e.value, -0) ? Prec.Unary : Prec.Primary;
      default:
        return Prec.Primary;
    }
  }

  // operand writes e, parenthesized unless it binds at least as tight as min.
  private operand(e: syntax.Expression, min: number): string {
    const text = this.expr(e);
    return this.precedence(e) < min ? `(${text})` : text;
  }

  expr(e: syntax.Expression): string {
    switch (e.kind) {
      case syntax.NodeKind.BooleanExpression:
        return e.value ? 'true' : 'false';
      case syntax.NodeKind.NumberExpression:
        return luaNumber(e.value);
      case syntax.NodeKind.StringExpression:
        return luaString(e.value);
      case syntax.NodeKind.NilExpression:
        return 'nil';
      case syntax.NodeKind.VarargExpression:
        return '...';
      case syntax.NodeKind.BinaryExpression: {
        const p = binaryPrec[e.op];
        const right = isRightAssociative(e.op);
        const lhs = this.operand(e.lhs, right ? p + 1 : p);
        const rhs = this.operand(e.rhs, right ? p : p + 1);
        return `${lhs} ${e.op} ${rhs}`;
      }
      case syntax.NodeKind.UnaryExpression: {
        const operand = this.operand(e.operand, Prec.Unary);
        if (e.op === 'not') {
          return `not ${operand}`;
        }
        // keep '- -x' from reading as a comment
        return e.op === '-' && operand.startsWith('-') ? `- ${operand}` : `${e.op}${operand}`;
      }
      case syntax.NodeKind.ParenthesizedExpression:
        return `(${this.expr(e.expression)})`;
      case syntax.NodeKind.IndexExpression:
        return this.prefix(e.base) + this.index(e.index);
      case syntax.NodeKind.FunctionCallExpression:
        return `${this.prefix(e.base)}(${this.exprList(e.args)})`;
      case syntax.NodeKind.PassSelfFunctionCallExpression:
        return `${this.prefix(e.base)}:${e.passSelfFunctionName}(${this.exprList(e.args)})`;
      case syntax.NodeKind.VariableExpression:
        return this.name(e.scope, e.id);
      case syntax.NodeKind.FunctionLiteralExpression:
        return this.functionBody('function', e.params, e.body);
      case syntax.NodeKind.TableConstructorExpression:
        return `{${e.entries.map((entry) => this.entry(entry)).join(', ')}}`;
    }
  }

  private entry(entry: syntax.TableEntryNode): string {
    if (entry.kind === syntax.NodeKind.TableEntry) {
      return this.expr(entry.value);
    }
    if (entry.key.kind === syntax.NodeKind.StringExpression && isIdentifier(entry.key.value)) {
      return `${entry.key.value} = ${this.expr(entry.value)}`;
    }
    return `[${this.expr(entry.key)}] = ${this.expr(entry.value)}`;
  }
}
