import { Err, Ok, Result } from 'ts-results';

import { SymbolIdSource } from '../resolve/binding';
import { Scope } from '../resolve/scope';
import { ParseError } from './error';
import * as syntax from './syntax';
import { Dialect, Position, Scanner, Token, TokenValue, dialectFeatures } from './tokenize';

export interface ParseOptions {
  // language variant; Lua 5.1 by default
  dialect?: Dialect;
  // name used in error positions
  filename?: string;
  // id source of the tree being built; pass a host tree's source to keep
  // the ids of a fragment disjoint from the host's
  ids?: SymbolIdSource;
}

// parse parses a whole program and returns its tree.
//
// Names are resolved while parsing: a name binds to the innermost local
// declaration in scope, or else is interned in the global namespace.
// Every reference is entered into the higher-scope ledger.
export function parse(source: string, options: ParseOptions = {}): Result<syntax.Chunk, ParseError> {
  try {
    const p = new Parser(source, options);
    p.nextToken(); // read first lookahead token
    return Ok(p.parseChunk());
  } catch (e) {
    if (e instanceof ParseError) {
      return Err(e);
    }
    throw e;
  }
}

// ParsedExpression is an expression together with the tree that owns
// its free names.
export interface ParsedExpression {
  expression: syntax.Expression;
  chunk: syntax.Chunk;
}

// parseExpression parses a single expression. Its names resolve in the
// body scope of an otherwise empty chunk.
export function parseExpression(
  source: string,
  options: ParseOptions = {}
): Result<ParsedExpression, ParseError> {
  try {
    const p = new Parser(source, options);
    p.nextToken();
    const expression = p.parseExpr();
    if (p.tok !== Token.EOF) {
      p.errorNear(`got ${p.tok} after expression, want ${Token.EOF}`);
    }
    return Ok({ expression, chunk: p.finishChunk([]) });
  } catch (e) {
    if (e instanceof ParseError) {
      return Err(e);
    }
    throw e;
  }
}

// binaryPriority gives the left and right binding power of each binary
// operator. Right associative operators bind weaker on the right.
const binaryPriority: Record<syntax.BinaryOperator, [number, number]> = {
  or: [1, 1],
  and: [2, 2],
  '<': [3, 3],
  '>': [3, 3],
  '<=': [3, 3],
  '>=': [3, 3],
  '~=': [3, 3],
  '==': [3, 3],
  '..': [5, 4],
  '+': [6, 6],
  '-': [6, 6],
  '*': [7, 7],
  '/': [7, 7],
  '%': [7, 7],
  '^': [10, 9],
};

const unaryPriority = 8;

const binaryTokens: Partial<Record<Token, syntax.BinaryOperator>> = {
  [Token.OR]: 'or',
  [Token.AND]: 'and',
  [Token.LT]: '<',
  [Token.GT]: '>',
  [Token.LE]: '<=',
  [Token.GE]: '>=',
  [Token.NEQ]: '~=',
  [Token.EQL]: '==',
  [Token.DOTDOT]: '..',
  [Token.PLUS]: '+',
  [Token.MINUS]: '-',
  [Token.STAR]: '*',
  [Token.SLASH]: '/',
  [Token.PERCENT]: '%',
  [Token.CARET]: '^',
};

const unaryTokens: Partial<Record<Token, syntax.UnaryOperator>> = {
  [Token.NOT]: 'not',
  [Token.MINUS]: '-',
  [Token.HASH]: '#',
};

const compoundTokens: Partial<Record<Token, syntax.CompoundOperator>> = {
  [Token.PLUS_EQ]: '+',
  [Token.MINUS_EQ]: '-',
  [Token.STAR_EQ]: '*',
  [Token.SLASH_EQ]: '/',
  [Token.PERCENT_EQ]: '%',
  [Token.CARET_EQ]: '^',
  [Token.DOTDOT_EQ]: '..',
};

// A FunctionState tracks what the parser needs to know about the
// function whose body it is reading.
interface FunctionState {
  isVararg: boolean;
  loopDepth: number;
}

class Parser {
  readonly input: Scanner;
  readonly dialect: Dialect;
  tok: Token = Token.ILLEGAL;
  tokval: TokenValue = new TokenValue();
  private ahead: { tok: Token; val: TokenValue } | null = null;

  private readonly globalScope: Scope;
  private readonly chunkScope: Scope;
  private scope: Scope;
  private functions: FunctionState[] = [{ isVararg: true, loopDepth: 0 }];

  constructor(source: string, options: ParseOptions) {
    this.dialect = options.dialect ?? Dialect.Lua51;
    this.input = new Scanner(options.filename ?? '<string>', source, dialectFeatures(this.dialect));
    this.globalScope = Scope.global(options.ids);
    this.chunkScope = new Scope(this.globalScope);
    this.scope = this.chunkScope;
  }

  // nextToken advances the scanner and returns the position of the
  // previous token.
  nextToken(): Position {
    const oldpos = this.tokval.pos;
    if (this.ahead !== null) {
      this.tok = this.ahead.tok;
      this.tokval = this.ahead.val;
      this.ahead = null;
    } else {
      this.tokval = new TokenValue();
      this.tok = this.input.nextToken(this.tokval);
    }
    return oldpos;
  }

  // peekToken returns the token after the current one.
  private peekToken(): Token {
    if (this.ahead === null) {
      const val = new TokenValue();
      this.ahead = { tok: this.input.nextToken(val), val };
    }
    return this.ahead.tok;
  }

  errorNear(msg: string): never {
    const near = this.tok === Token.EOF ? '<eof>' : `'${this.tokval.raw}'`;
    this.input.error(this.tokval.pos, `${msg} near ${near}`);
  }

  private consume(t: Token): Position {
    if (this.tok !== t) {
      this.errorNear(`'${t}' expected`);
    }
    return this.nextToken();
  }

  // consumeClosing consumes the token closing a construct opened at pos.
  private consumeClosing(t: Token, opener: Token, pos: Position): void {
    if (this.tok !== t) {
      if (pos.line === this.tokval.pos.line) {
        this.errorNear(`'${t}' expected`);
      }
      this.errorNear(`'${t}' expected (to close '${opener}' at line ${pos.line})`);
    }
    this.nextToken();
  }

  private parseName(): string {
    if (this.tok !== Token.IDENT) {
      this.errorNear('<name> expected');
    }
    const name = this.tokval.string;
    this.nextToken();
    return name;
  }

  private get fn(): FunctionState {
    return this.functions[this.functions.length - 1];
  }

  private pushScope(): Scope {
    this.scope = new Scope(this.scope);
    return this.scope;
  }

  private popScope(): void {
    const parent = this.scope.parent;
    if (parent === null || parent.isGlobal) {
      throw new Error('parser scope stack underflow');
    }
    this.scope = parent;
  }

  // reference binds name as used in the current scope.
  private reference(name: string): syntax.VariableExpression {
    const binding = this.scope.lookup(name) ?? this.scope.resolveGlobal(name);
    this.scope.addReferenceToHigherScope(binding.scope, binding.id);
    return new syntax.VariableExpression(binding.scope, binding.id);
  }

  finishChunk(statements: syntax.Statement[]): syntax.Chunk {
    const body = new syntax.Block(statements, this.chunkScope, true);
    return new syntax.Chunk(body, this.globalScope, this.dialect);
  }

  // chunk = block EOF
  parseChunk(): syntax.Chunk {
    const statements = this.parseStatements();
    if (this.tok !== Token.EOF) {
      this.errorNear(`'${Token.EOF}' expected`);
    }
    return this.finishChunk(statements);
  }

  private blockFollows(): boolean {
    switch (this.tok) {
      case Token.EOF:
      case Token.END:
      case Token.ELSE:
      case Token.ELSEIF:
      case Token.UNTIL:
        return true;
      default:
        return false;
    }
  }

  // parseStatements reads statements into the current scope up to the
  // end of the enclosing block.
  private parseStatements(): syntax.Statement[] {
    const stmts: syntax.Statement[] = [];
    while (!this.blockFollows()) {
      if (this.tok === Token.SEMI) {
        this.nextToken();
        continue;
      }
      const last = this.parseLastStatement();
      if (last !== null) {
        stmts.push(last);
        if (this.tok === Token.SEMI) {
          this.nextToken();
        }
        if (!this.blockFollows()) {
          this.errorNear(`'${Token.END}' expected`);
        }
        break;
      }
      stmts.push(this.parseStatement());
    }
    return stmts;
  }

  // parseBlock reads a block with a scope of its own.
  private parseBlock(): syntax.Block {
    const scope = this.pushScope();
    const stmts = this.parseStatements();
    this.popScope();
    return new syntax.Block(stmts, scope);
  }

  // laststat = return [explist] | break | continue
  private parseLastStatement(): syntax.Statement | null {
    switch (this.tok) {
      case Token.RETURN: {
        this.nextToken();
        const args = this.blockFollows() || this.tok === Token.SEMI ? [] : this.parseExprList();
        return new syntax.ReturnStatement(args);
      }
      case Token.BREAK:
        if (this.fn.loopDepth === 0) {
          this.errorNear('no loop to break');
        }
        this.nextToken();
        return new syntax.BreakStatement();
      case Token.CONTINUE:
        if (this.fn.loopDepth === 0) {
          this.errorNear('no loop to continue');
        }
        this.nextToken();
        return new syntax.ContinueStatement();
      default:
        return null;
    }
  }

  private parseStatement(): syntax.Statement {
    switch (this.tok) {
      case Token.IF:
        return this.parseIfStatement();
      case Token.WHILE:
        return this.parseWhileStatement();
      case Token.DO: {
        const pos = this.nextToken();
        const body = this.parseBlock();
        this.consumeClosing(Token.END, Token.DO, pos);
        return new syntax.DoStatement(body);
      }
      case Token.FOR:
        return this.parseForStatement();
      case Token.REPEAT:
        return this.parseRepeatStatement();
      case Token.FUNCTION:
        return this.parseFunctionDeclaration();
      case Token.LOCAL:
        this.nextToken();
        if (this.tok === Token.FUNCTION) {
          return this.parseLocalFunctionDeclaration();
        }
        return this.parseLocalVariableDeclaration();
      default:
        return this.parseExprStatement();
    }
  }

  private parseLoopBody(): syntax.Block {
    this.fn.loopDepth++;
    const body = this.parseBlock();
    this.fn.loopDepth--;
    return body;
  }

  // if exp then block {elseif exp then block} [else block] end
  private parseIfStatement(): syntax.Statement {
    const pos = this.nextToken(); // consume IF
    const condition = this.parseExpr();
    this.consume(Token.THEN);
    const body = this.parseBlock();
    const elseifs: syntax.ElseIfClause[] = [];
    while (this.tok === Token.ELSEIF) {
      this.nextToken();
      const cond = this.parseExpr();
      this.consume(Token.THEN);
      elseifs.push({ condition: cond, body: this.parseBlock() });
    }
    let elseBody: syntax.Block | null = null;
    if (this.tok === Token.ELSE) {
      this.nextToken();
      elseBody = this.parseBlock();
    }
    this.consumeClosing(Token.END, Token.IF, pos);
    return new syntax.IfStatement(condition, body, elseifs, elseBody);
  }

  // while exp do block end
  private parseWhileStatement(): syntax.Statement {
    const pos = this.nextToken(); // consume WHILE
    const condition = this.parseExpr();
    this.consume(Token.DO);
    const body = this.parseLoopBody();
    this.consumeClosing(Token.END, Token.WHILE, pos);
    return new syntax.WhileStatement(condition, body);
  }

  // repeat block until exp; the condition sees the block's locals
  private parseRepeatStatement(): syntax.Statement {
    const pos = this.nextToken(); // consume REPEAT
    const scope = this.pushScope();
    this.fn.loopDepth++;
    const stmts = this.parseStatements();
    this.fn.loopDepth--;
    this.consumeClosing(Token.UNTIL, Token.REPEAT, pos);
    const condition = this.parseExpr();
    this.popScope();
    return new syntax.RepeatStatement(new syntax.Block(stmts, scope), condition);
  }

  // for Name = exp, exp [, exp] do block end
  // for namelist in explist do block end
  private parseForStatement(): syntax.Statement {
    const pos = this.nextToken(); // consume FOR
    const first = this.parseName();
    if (this.tok === Token.EQ) {
      this.nextToken();
      const initial = this.parseExpr();
      this.consume(Token.COMMA);
      const limit = this.parseExpr();
      let step: syntax.Expression | null = null;
      if (this.tok === Token.COMMA) {
        this.nextToken();
        step = this.parseExpr();
      }
      this.consume(Token.DO);
      const scope = this.pushScope();
      const id = scope.addVariable(first);
      const body = this.parseLoopBodyStatements(scope);
      this.consumeClosing(Token.END, Token.FOR, pos);
      return new syntax.ForStatement(id, initial, limit, step, body);
    }

    const names = [first];
    while (this.tok === Token.COMMA) {
      this.nextToken();
      names.push(this.parseName());
    }
    if (this.tok !== Token.IN) {
      this.errorNear(`'${Token.EQ}' or '${Token.IN}' expected`);
    }
    this.nextToken();
    const exprs = this.parseExprList();
    this.consume(Token.DO);
    const scope = this.pushScope();
    const ids = names.map((name) => scope.addVariable(name));
    const body = this.parseLoopBodyStatements(scope);
    this.consumeClosing(Token.END, Token.FOR, pos);
    return new syntax.ForInStatement(ids, exprs, body);
  }

  // parseLoopBodyStatements finishes a loop body whose scope has already
  // been pushed to declare the loop variables.
  private parseLoopBodyStatements(scope: Scope): syntax.Block {
    this.fn.loopDepth++;
    const stmts = this.parseStatements();
    this.fn.loopDepth--;
    this.popScope();
    return new syntax.Block(stmts, scope);
  }

  // function Name {'.' Name} [':' Name] funcbody
  private parseFunctionDeclaration(): syntax.Statement {
    const pos = this.nextToken(); // consume FUNCTION
    const base = this.reference(this.parseName());
    const indices: string[] = [];
    while (this.tok === Token.DOT) {
      this.nextToken();
      indices.push(this.parseName());
    }
    let isMethod = false;
    if (this.tok === Token.COLON) {
      this.nextToken();
      indices.push(this.parseName());
      isMethod = true;
    }
    const [params, body] = this.parseFunctionBody(pos, isMethod);
    return new syntax.FunctionDeclaration(base.scope, base.id, indices, params, body);
  }

  // local function Name funcbody; the name is in scope inside the body
  private parseLocalFunctionDeclaration(): syntax.Statement {
    const pos = this.nextToken(); // consume FUNCTION
    const id = this.scope.addVariable(this.parseName());
    const [params, body] = this.parseFunctionBody(pos, false);
    return new syntax.LocalFunctionDeclaration(this.scope, id, params, body);
  }

  // local namelist ['=' explist]; the names are in scope after the statement
  private parseLocalVariableDeclaration(): syntax.Statement {
    const names = [this.parseName()];
    while (this.tok === Token.COMMA) {
      this.nextToken();
      names.push(this.parseName());
    }
    let exprs: syntax.Expression[] = [];
    if (this.tok === Token.EQ) {
      this.nextToken();
      exprs = this.parseExprList();
    }
    const ids = names.map((name) => this.scope.addVariable(name));
    return new syntax.LocalVariableDeclaration(this.scope, ids, exprs);
  }

  // funcbody = '(' [parlist] ')' block end
  private parseFunctionBody(pos: Position, isMethod: boolean): [syntax.FunctionParameter[], syntax.Block] {
    const scope = this.pushScope();
    const params: syntax.FunctionParameter[] = [];
    if (isMethod) {
      params.push(new syntax.VariableExpression(scope, scope.addVariable('self')));
    }
    let isVararg = false;
    this.consume(Token.LPAREN);
    if (this.tok !== Token.RPAREN) {
      while (true) {
        if (this.tok === Token.ELLIPSIS) {
          this.nextToken();
          params.push(new syntax.VarargExpression());
          isVararg = true;
          break;
        }
        params.push(new syntax.VariableExpression(scope, scope.addVariable(this.parseName())));
        if (this.tok !== Token.COMMA) {
          break;
        }
        this.nextToken();
      }
    }
    this.consume(Token.RPAREN);
    this.functions.push({ isVararg, loopDepth: 0 });
    const stmts = this.parseStatements();
    this.functions.pop();
    this.consumeClosing(Token.END, Token.FUNCTION, pos);
    this.popScope();
    return [params, new syntax.Block(stmts, scope, true)];
  }

  // exprstat = functioncall | varlist '=' explist | var op= exp
  private parseExprStatement(): syntax.Statement {
    const expr = this.parseSuffixedExpr();

    if (this.tok === Token.EQ || this.tok === Token.COMMA) {
      const lhs = [this.toAssignmentTarget(expr)];
      while (this.tok === Token.COMMA) {
        this.nextToken();
        lhs.push(this.toAssignmentTarget(this.parseSuffixedExpr()));
      }
      this.consume(Token.EQ);
      return new syntax.AssignmentStatement(lhs, this.parseExprList());
    }

    const compound = compoundTokens[this.tok];
    if (compound !== undefined) {
      this.nextToken();
      return new syntax.CompoundAssignmentStatement(compound, this.toAssignmentTarget(expr), this.parseExpr());
    }

    switch (expr.kind) {
      case syntax.NodeKind.FunctionCallExpression:
        return new syntax.FunctionCallStatement(expr.base, expr.args);
      case syntax.NodeKind.PassSelfFunctionCallExpression:
        return new syntax.PassSelfFunctionCallStatement(expr.base, expr.passSelfFunctionName, expr.args);
      default:
        this.errorNear('syntax error');
    }
  }

  private toAssignmentTarget(expr: syntax.Expression): syntax.AssignmentTarget {
    switch (expr.kind) {
      case syntax.NodeKind.VariableExpression:
        return new syntax.AssignmentVariable(expr.scope, expr.id);
      case syntax.NodeKind.IndexExpression:
        return new syntax.AssignmentIndexing(expr.base, expr.index);
      default:
        this.errorNear('cannot assign to this expression');
    }
  }

  parseExprList(): syntax.Expression[] {
    const exprs = [this.parseExpr()];
    while (this.tok === Token.COMMA) {
      this.nextToken();
      exprs.push(this.parseExpr());
    }
    return exprs;
  }

  parseExpr(): syntax.Expression {
    return this.parseSubExpr(0);
  }

  // subexpr = (simpleexp | unop subexpr) {binop subexpr}
  // where binop is any binary operator with a priority higher than limit
  private parseSubExpr(limit: number): syntax.Expression {
    let left: syntax.Expression;
    const unop = unaryTokens[this.tok];
    if (unop !== undefined) {
      this.nextToken();
      left = new syntax.UnaryExpression(unop, this.parseSubExpr(unaryPriority));
    } else {
      left = this.parseSimpleExpr();
    }
    while (true) {
      const op = binaryTokens[this.tok];
      if (op === undefined) {
        break;
      }
      const [lp, rp] = binaryPriority[op];
      if (lp <= limit) {
        break;
      }
      this.nextToken();
      const right = this.parseSubExpr(rp);
      left = new syntax.BinaryExpression(op, left, right);
    }
    return left;
  }

  // simpleexp = NUMBER | STRING | nil | true | false | '...' |
  //             constructor | function funcbody | suffixedexp
  private parseSimpleExpr(): syntax.Expression {
    switch (this.tok) {
      case Token.NUMBER: {
        const value = this.tokval.number;
        this.nextToken();
        return new syntax.NumberExpression(value);
      }
      case Token.STRING: {
        const value = this.tokval.string;
        this.nextToken();
        return new syntax.StringExpression(value);
      }
      case Token.NIL:
        this.nextToken();
        return new syntax.NilExpression();
      case Token.TRUE:
        this.nextToken();
        return new syntax.BooleanExpression(true);
      case Token.FALSE:
        this.nextToken();
        return new syntax.BooleanExpression(false);
      case Token.ELLIPSIS:
        if (!this.fn.isVararg) {
          this.errorNear("cannot use '...' outside a vararg function");
        }
        this.nextToken();
        return new syntax.VarargExpression();
      case Token.LBRACE:
        return this.parseTableConstructor();
      case Token.FUNCTION: {
        const pos = this.nextToken();
        const [params, body] = this.parseFunctionBody(pos, false);
        return new syntax.FunctionLiteralExpression(params, body);
      }
      default:
        return this.parseSuffixedExpr();
    }
  }

  // primaryexp = NAME | '(' expr ')'
  private parsePrimaryExpr(): syntax.Expression {
    if (this.tok === Token.IDENT) {
      return this.reference(this.parseName());
    }
    if (this.tok === Token.LPAREN) {
      const pos = this.nextToken();
      const expr = this.parseExpr();
      this.consumeClosing(Token.RPAREN, Token.LPAREN, pos);
      return new syntax.ParenthesizedExpression(expr);
    }
    this.errorNear('unexpected symbol');
  }

  // suffixedexp = primaryexp {'.' NAME | '[' exp ']' | ':' NAME args | args}
  private parseSuffixedExpr(): syntax.Expression {
    let expr = this.parsePrimaryExpr();
    while (true) {
      switch (this.tok) {
        case Token.DOT: {
          this.nextToken();
          expr = new syntax.IndexExpression(expr, new syntax.StringExpression(this.parseName()));
          break;
        }
        case Token.LBRACK: {
          this.nextToken();
          const index = this.parseExpr();
          this.consume(Token.RBRACK);
          expr = new syntax.IndexExpression(expr, index);
          break;
        }
        case Token.COLON: {
          this.nextToken();
          const name = this.parseName();
          expr = new syntax.PassSelfFunctionCallExpression(expr, name, this.parseCallArgs());
          break;
        }
        case Token.LPAREN:
        case Token.STRING:
        case Token.LBRACE:
          expr = new syntax.FunctionCallExpression(expr, this.parseCallArgs());
          break;
        default:
          return expr;
      }
    }
  }

  // args = '(' [explist] ')' | constructor | STRING
  private parseCallArgs(): syntax.Expression[] {
    switch (this.tok) {
      case Token.STRING: {
        const value = this.tokval.string;
        this.nextToken();
        return [new syntax.StringExpression(value)];
      }
      case Token.LBRACE:
        return [this.parseTableConstructor()];
      case Token.LPAREN: {
        const pos = this.nextToken();
        const args = this.tok === Token.RPAREN ? [] : this.parseExprList();
        this.consumeClosing(Token.RPAREN, Token.LPAREN, pos);
        return args;
      }
      default:
        this.errorNear('function arguments expected');
    }
  }

  // constructor = '{' [field {sep field} [sep]] '}'
  // field = '[' exp ']' '=' exp | NAME '=' exp | exp
  private parseTableConstructor(): syntax.TableConstructorExpression {
    const pos = this.consume(Token.LBRACE);
    const entries: syntax.TableEntryNode[] = [];
    while (this.tok !== Token.RBRACE) {
      if (this.tok === Token.LBRACK) {
        this.nextToken();
        const key = this.parseExpr();
        this.consume(Token.RBRACK);
        this.consume(Token.EQ);
        entries.push(new syntax.KeyedTableEntry(key, this.parseExpr()));
      } else if (this.tok === Token.IDENT && this.peekToken() === Token.EQ) {
        const key = new syntax.StringExpression(this.parseName());
        this.nextToken(); // consume EQ
        entries.push(new syntax.KeyedTableEntry(key, this.parseExpr()));
      } else {
        entries.push(new syntax.TableEntry(this.parseExpr()));
      }
      if (this.tok === Token.COMMA || this.tok === Token.SEMI) {
        this.nextToken();
      } else {
        break;
      }
    }
    this.consumeClosing(Token.RBRACE, Token.LBRACE, pos);
    return new syntax.TableConstructorExpression(entries);
  }
}
