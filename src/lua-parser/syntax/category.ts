import {
  AssignmentTarget,
  Expression,
  FunctionNode,
  FunctionParameter,
  Node,
  Statement,
  TableEntryNode,
} from './interface';
import { NodeKind } from './kind';

// Guards for the node categories that make up the child slots of the tree.

export function isExpression(n: Node): n is Expression {
  switch (n.kind) {
    case NodeKind.BooleanExpression:
    case NodeKind.NumberExpression:
    case NodeKind.StringExpression:
    case NodeKind.NilExpression:
    case NodeKind.VarargExpression:
    case NodeKind.BinaryExpression:
    case NodeKind.UnaryExpression:
    case NodeKind.ParenthesizedExpression:
    case NodeKind.IndexExpression:
    case NodeKind.FunctionCallExpression:
    case NodeKind.PassSelfFunctionCallExpression:
    case NodeKind.VariableExpression:
    case NodeKind.FunctionLiteralExpression:
    case NodeKind.TableConstructorExpression:
      return true;
    default:
      return false;
  }
}

export function isStatement(n: Node): n is Statement {
  switch (n.kind) {
    case NodeKind.LocalVariableDeclaration:
    case NodeKind.LocalFunctionDeclaration:
    case NodeKind.FunctionDeclaration:
    case NodeKind.AssignmentStatement:
    case NodeKind.CompoundAssignmentStatement:
    case NodeKind.FunctionCallStatement:
    case NodeKind.PassSelfFunctionCallStatement:
    case NodeKind.ReturnStatement:
    case NodeKind.DoStatement:
    case NodeKind.WhileStatement:
    case NodeKind.RepeatStatement:
    case NodeKind.ForStatement:
    case NodeKind.ForInStatement:
    case NodeKind.IfStatement:
    case NodeKind.BreakStatement:
    case NodeKind.ContinueStatement:
      return true;
    default:
      return false;
  }
}

export function isAssignmentTarget(n: Node): n is AssignmentTarget {
  return n.kind === NodeKind.AssignmentVariable || n.kind === NodeKind.AssignmentIndexing;
}

export function isTableEntryNode(n: Node): n is TableEntryNode {
  return n.kind === NodeKind.TableEntry || n.kind === NodeKind.KeyedTableEntry;
}

export function isFunctionParameter(n: Node): n is FunctionParameter {
  return n.kind === NodeKind.VariableExpression || n.kind === NodeKind.VarargExpression;
}

export function isFunctionNode(n: Node): n is FunctionNode {
  switch (n.kind) {
    case NodeKind.FunctionLiteralExpression:
    case NodeKind.LocalFunctionDeclaration:
    case NodeKind.FunctionDeclaration:
      return true;
    default:
      return false;
  }
}

// isLastStatement reports whether s must end its block.
export function isLastStatement(s: Statement): boolean {
  switch (s.kind) {
    case NodeKind.ReturnStatement:
    case NodeKind.BreakStatement:
    case NodeKind.ContinueStatement:
      return true;
    default:
      return false;
  }
}
