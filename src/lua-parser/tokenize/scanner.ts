import { ParseError } from '../error';
import { Position } from './position';
import { DialectFeatures, Token, TokenValue, keywordToken } from './token';

const compoundTokens: Record<string, Token> = {
  '+': Token.PLUS_EQ,
  '-': Token.MINUS_EQ,
  '*': Token.STAR_EQ,
  '/': Token.SLASH_EQ,
  '%': Token.PERCENT_EQ,
  '^': Token.CARET_EQ,
};

const simpleEscapes: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  '"': '"',
  "'": "'",
  '\n': '\n',
};

function isDigit(c: string): boolean {
  return c >= '0' && c <= '9';
}

function isHexDigit(c: string): boolean {
  return isDigit(c) || (c >= 'a' && c <= 'f') || (c >= 'A' && c <= 'F');
}

function isIdentStart(c: string): boolean {
  return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_';
}

function isIdent(c: string): boolean {
  return isIdentStart(c) || isDigit(c);
}

function isSpace(c: string): boolean {
  return c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\f' || c === '\v';
}

// utf8Bytes encodes a code point as a string holding one char per byte.
function utf8Bytes(cp: number): string {
  if (cp < 0x80) {
    return String.fromCharCode(cp);
  }
  if (cp < 0x800) {
    return String.fromCharCode(0xc0 | (cp >> 6), 0x80 | (cp & 0x3f));
  }
  if (cp < 0x10000) {
    return String.fromCharCode(
      0xe0 | (cp >> 12),
      0x80 | ((cp >> 6) & 0x3f),
      0x80 | (cp & 0x3f)
    );
  }
  return String.fromCharCode(
    0xf0 | (cp >> 18),
    0x80 | ((cp >> 12) & 0x3f),
    0x80 | ((cp >> 6) & 0x3f),
    0x80 | (cp & 0x3f)
  );
}

// A Scanner splits Lua source text into tokens.
//
// Source text is expected to hold one char per byte of the input
// file (read it as latin1); string literals decode to the same form.
export class Scanner {
  // complete input
  private src: string;
  // offset of the next unread char
  private offset = 0;
  // offset where the current token started
  private tokenStart = 0;
  // current input position
  pos: Position;
  private features: DialectFeatures;

  constructor(filename: string, src: string, features: DialectFeatures) {
    this.src = src;
    this.pos = new Position(filename, 1, 1);
    this.features = features;
    // a leading #! line is not Lua
    if (src.startsWith('#')) {
      while (!this.isEof() && this.peekRune() !== '\n') {
        this.readRune();
      }
    }
  }

  error(pos: Position, msg: string): never {
    throw new ParseError(pos, msg);
  }

  // isEof reports whether the input has reached end of file.
  isEof(): boolean {
    return this.offset >= this.src.length;
  }

  // peekRune returns the char k places ahead without consuming it,
  // or '\0' past the end of input.
  peekRune(k = 0): string {
    const i = this.offset + k;
    if (i >= this.src.length) {
      return '\0';
    }
    return this.src[i];
  }

  // readRune consumes and returns the next char of input.
  // Newlines in Unix, DOS, or Mac format are treated as one char, '\n'.
  readRune(): string {
    if (this.isEof()) {
      this.error(this.pos, 'unexpected end of file');
    }
    let r = this.src[this.offset++];
    if (r === '\r') {
      if (this.peekRune() === '\n') {
        this.offset++;
      }
      r = '\n';
    } else if (r === '\n' && this.peekRune() === '\r') {
      this.offset++;
    }
    this.pos = this.pos.after(r);
    return r;
  }

  // startToken marks the beginning of the next input token.
  private startToken(val: TokenValue): void {
    this.tokenStart = this.offset;
    val.raw = '';
    val.string = '';
    val.number = 0;
    val.pos = this.pos;
  }

  // endToken records the raw text of the token just consumed.
  private endToken(val: TokenValue): void {
    if (val.raw === '') {
      val.raw = this.src.slice(this.tokenStart, this.offset);
    }
  }

  // nextToken is called by the parser to obtain the next input token.
  // It returns the token and sets val to the data associated with it.
  nextToken(val: TokenValue): Token {
    this.skipSpaceAndComments();
    this.startToken(val);
    const tok = this.scanToken(val);
    this.endToken(val);
    return tok;
  }

  private skipSpaceAndComments(): void {
    while (!this.isEof()) {
      const c = this.peekRune();
      if (isSpace(c)) {
        this.readRune();
        continue;
      }
      if (c === '-' && this.peekRune(1) === '-') {
        this.readRune();
        this.readRune();
        const level = this.longBracketLevel();
        if (level >= 0) {
          this.readLongString(level, 'comment');
        } else {
          while (!this.isEof() && this.peekRune() !== '\n' && this.peekRune() !== '\r') {
            this.readRune();
          }
        }
        continue;
      }
      break;
    }
  }

  private scanToken(val: TokenValue): Token {
    if (this.isEof()) {
      return Token.EOF;
    }
    const c = this.peekRune();

    if (isIdentStart(c)) {
      let name = '';
      while (isIdent(this.peekRune())) {
        name += this.readRune();
      }
      const kw = keywordToken[name];
      if (kw !== undefined) {
        return kw;
      }
      if (name === 'continue' && this.features.continueStatement) {
        return Token.CONTINUE;
      }
      val.string = name;
      return Token.IDENT;
    }

    if (isDigit(c) || (c === '.' && isDigit(this.peekRune(1)))) {
      val.number = this.scanNumber();
      return Token.NUMBER;
    }

    if (c === '"' || c === "'") {
      val.string = this.scanString();
      return Token.STRING;
    }

    if (c === '[') {
      const level = this.longBracketLevel();
      if (level >= 0) {
        val.string = this.readLongString(level, 'string');
        return Token.STRING;
      }
      this.readRune();
      return Token.LBRACK;
    }

    this.readRune();
    switch (c) {
      case '+':
      case '-':
      case '*':
      case '/':
      case '%':
      case '^':
        if (this.features.compoundAssignment && this.peekRune() === '=') {
          this.readRune();
          return compoundTokens[c];
        }
        return this.singleCharToken(c);
      case '#':
        return Token.HASH;
      case '=':
        if (this.peekRune() === '=') {
          this.readRune();
          return Token.EQL;
        }
        return Token.EQ;
      case '~':
        if (this.peekRune() === '=') {
          this.readRune();
          return Token.NEQ;
        }
        break;
      case '<':
        if (this.peekRune() === '=') {
          this.readRune();
          return Token.LE;
        }
        return Token.LT;
      case '>':
        if (this.peekRune() === '=') {
          this.readRune();
          return Token.GE;
        }
        return Token.GT;
      case '(':
        return Token.LPAREN;
      case ')':
        return Token.RPAREN;
      case '{':
        return Token.LBRACE;
      case '}':
        return Token.RBRACE;
      case ']':
        return Token.RBRACK;
      case ';':
        return Token.SEMI;
      case ':':
        return Token.COLON;
      case ',':
        return Token.COMMA;
      case '.':
        if (this.peekRune() === '.') {
          this.readRune();
          if (this.peekRune() === '.') {
            this.readRune();
            return Token.ELLIPSIS;
          }
          if (this.features.compoundAssignment && this.peekRune() === '=') {
            this.readRune();
            return Token.DOTDOT_EQ;
          }
          return Token.DOTDOT;
        }
        return Token.DOT;
    }
    this.error(val.pos, `unexpected input character ${JSON.stringify(c)}`);
  }

  private singleCharToken(c: string): Token {
    switch (c) {
      case '+':
        return Token.PLUS;
      case '-':
        return Token.MINUS;
      case '*':
        return Token.STAR;
      case '/':
        return Token.SLASH;
      case '%':
        return Token.PERCENT;
      default:
        return Token.CARET;
    }
  }

  private scanNumber(): number {
    const start = this.pos;
    let text = '';
    if (this.peekRune() === '0' && (this.peekRune(1) === 'x' || this.peekRune(1) === 'X')) {
      this.readRune();
      this.readRune();
      while (isHexDigit(this.peekRune()) || (this.peekRune() === '_' && this.features.compoundAssignment)) {
        const r = this.readRune();
        if (r !== '_') {
          text += r;
        }
      }
      if (text === '' || isIdent(this.peekRune())) {
        this.error(start, 'malformed number');
      }
      return parseInt(text, 16);
    }
    if (
      this.features.compoundAssignment &&
      this.peekRune() === '0' &&
      (this.peekRune(1) === 'b' || this.peekRune(1) === 'B')
    ) {
      this.readRune();
      this.readRune();
      while (this.peekRune() === '0' || this.peekRune() === '1' || this.peekRune() === '_') {
        const r = this.readRune();
        if (r !== '_') {
          text += r;
        }
      }
      if (text === '' || isIdent(this.peekRune())) {
        this.error(start, 'malformed number');
      }
      return parseInt(text, 2);
    }

    const digits = (): void => {
      while (isDigit(this.peekRune()) || (this.peekRune() === '_' && this.features.compoundAssignment)) {
        const r = this.readRune();
        if (r !== '_') {
          text += r;
        }
      }
    };
    digits();
    if (this.peekRune() === '.') {
      text += this.readRune();
      digits();
    }
    if (this.peekRune() === 'e' || this.peekRune() === 'E') {
      text += this.readRune();
      if (this.peekRune() === '+' || this.peekRune() === '-') {
        text += this.readRune();
      }
      if (!isDigit(this.peekRune())) {
        this.error(start, 'malformed number');
      }
      digits();
    }
    if (isIdent(this.peekRune()) || this.peekRune() === '.') {
      this.error(start, 'malformed number');
    }
    return Number(text);
  }

  private scanString(): string {
    const start = this.pos;
    const quote = this.readRune();
    let out = '';
    while (true) {
      if (this.isEof()) {
        this.error(start, 'unfinished string');
      }
      const at = this.pos;
      const c = this.readRune();
      if (c === quote) {
        return out;
      }
      if (c === '\n') {
        this.error(start, 'unfinished string');
      }
      if (c !== '\\') {
        out += this.bytesOf(c, at);
        continue;
      }
      out += this.scanEscape();
    }
  }

  private scanEscape(): string {
    const pos = this.pos;
    const e = this.readRune();
    const simple = simpleEscapes[e];
    if (simple !== undefined) {
      return simple;
    }
    if (isDigit(e)) {
      let digits = e;
      while (digits.length < 3 && isDigit(this.peekRune())) {
        digits += this.readRune();
      }
      const code = parseInt(digits, 10);
      if (code > 255) {
        this.error(pos, 'decimal escape too large');
      }
      return String.fromCharCode(code);
    }
    if (e === 'x') {
      const hex = this.readRune() + this.readRune();
      if (!isHexDigit(hex[0]) || !isHexDigit(hex[1])) {
        this.error(pos, 'hexadecimal digit expected');
      }
      return String.fromCharCode(parseInt(hex, 16));
    }
    if (e === 'z') {
      while (isSpace(this.peekRune())) {
        this.readRune();
      }
      return '';
    }
    if (e === 'u' && this.peekRune() === '{') {
      this.readRune();
      let hex = '';
      while (isHexDigit(this.peekRune())) {
        hex += this.readRune();
      }
      if (hex === '' || this.readRune() !== '}') {
        this.error(pos, 'malformed unicode escape');
      }
      const cp = parseInt(hex, 16);
      if (cp > 0x10ffff) {
        this.error(pos, 'unicode escape too large');
      }
      return utf8Bytes(cp);
    }
    this.error(pos, `invalid escape sequence '\\${e}'`);
  }

  // longBracketLevel reports the level of a long bracket opening at the
  // current offset ('[' '='* '['), or -1 if there is none.
  private longBracketLevel(): number {
    if (this.peekRune() !== '[') {
      return -1;
    }
    let level = 0;
    while (this.peekRune(level + 1) === '=') {
      level++;
    }
    return this.peekRune(level + 1) === '[' ? level : -1;
  }

  private readLongString(level: number, what: 'string' | 'comment'): string {
    const start = this.pos;
    for (let i = 0; i < level + 2; i++) {
      this.readRune();
    }
    // a newline directly after the opening bracket is skipped
    if (this.peekRune() === '\n' || this.peekRune() === '\r') {
      this.readRune();
    }
    const close = ']' + '='.repeat(level) + ']';
    let out = '';
    while (true) {
      if (this.isEof()) {
        this.error(start, `unfinished long ${what}`);
      }
      if (this.peekRune() === ']' && this.src.startsWith(close, this.offset)) {
        for (let i = 0; i < close.length; i++) {
          this.readRune();
        }
        return out;
      }
      const at = this.pos;
      const c = this.readRune();
      out += what === 'string' ? this.bytesOf(c, at) : c;
    }
  }

  // bytesOf returns c, or its UTF-8 bytes when it is wider than a byte.
  // A high surrogate takes the low surrogate that follows it.
  private bytesOf(c: string, pos: Position): string {
    const unit = c.charCodeAt(0);
    if (unit < 0x100) {
      return c;
    }
    if (unit >= 0xd800 && unit <= 0xdbff) {
      const low = this.peekRune().charCodeAt(0);
      if (low >= 0xdc00 && low <= 0xdfff) {
        this.readRune();
        return utf8Bytes(0x10000 + ((unit - 0xd800) << 10) + (low - 0xdc00));
      }
    }
    if (unit >= 0xd800 && unit <= 0xdfff) {
      this.error(pos, 'unpaired surrogate in string');
    }
    return utf8Bytes(unit);
  }
}
