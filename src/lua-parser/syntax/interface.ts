import type { Block } from './nodes/block';
import type { Chunk } from './nodes/chunk';
import type {
  BinaryExpression,
  BooleanExpression,
  FunctionCallExpression,
  FunctionLiteralExpression,
  IndexExpression,
  KeyedTableEntry,
  NilExpression,
  NumberExpression,
  ParenthesizedExpression,
  PassSelfFunctionCallExpression,
  StringExpression,
  TableConstructorExpression,
  TableEntry,
  UnaryExpression,
  VarargExpression,
  VariableExpression,
} from './exprs';
import type {
  AssignmentIndexing,
  AssignmentStatement,
  AssignmentVariable,
  BreakStatement,
  CompoundAssignmentStatement,
  ContinueStatement,
  DoStatement,
  ForInStatement,
  ForStatement,
  FunctionCallStatement,
  FunctionDeclaration,
  IfStatement,
  LocalFunctionDeclaration,
  LocalVariableDeclaration,
  PassSelfFunctionCallStatement,
  RepeatStatement,
  ReturnStatement,
  WhileStatement,
} from './stmts';
import { NodeTag, NodeTags } from './tags';

// BaseNode holds what every syntax node has: its tag set.
export abstract class BaseNode {
  readonly tags: NodeTags;

  constructor(tags: NodeTags) {
    this.tags = tags;
  }

  hasTag(tag: NodeTag): boolean {
    return this.tags.has(tag);
  }
}

export type Expression =
  | BooleanExpression
  | NumberExpression
  | StringExpression
  | NilExpression
  | VarargExpression
  | BinaryExpression
  | UnaryExpression
  | ParenthesizedExpression
  | IndexExpression
  | FunctionCallExpression
  | PassSelfFunctionCallExpression
  | VariableExpression
  | FunctionLiteralExpression
  | TableConstructorExpression;

export type Statement =
  | LocalVariableDeclaration
  | LocalFunctionDeclaration
  | FunctionDeclaration
  | AssignmentStatement
  | CompoundAssignmentStatement
  | FunctionCallStatement
  | PassSelfFunctionCallStatement
  | ReturnStatement
  | DoStatement
  | WhileStatement
  | RepeatStatement
  | ForStatement
  | ForInStatement
  | IfStatement
  | BreakStatement
  | ContinueStatement;

export type AssignmentTarget = AssignmentVariable | AssignmentIndexing;

export type TableEntryNode = TableEntry | KeyedTableEntry;

// A FunctionParameter is a named parameter or a trailing '...'.
export type FunctionParameter = VariableExpression | VarargExpression;

// A FunctionNode is any node that owns a function body.
export type FunctionNode =
  | FunctionLiteralExpression
  | LocalFunctionDeclaration
  | FunctionDeclaration;

// A Node is any node of a Lua syntax tree.
export type Node =
  | Chunk
  | Block
  | Statement
  | AssignmentTarget
  | Expression
  | TableEntryNode;
