// NodeKind is the closed set of syntax node kinds.
export enum NodeKind {
  Chunk = 'Chunk',
  Block = 'Block',

  // statements
  LocalVariableDeclaration = 'LocalVariableDeclaration',
  LocalFunctionDeclaration = 'LocalFunctionDeclaration',
  FunctionDeclaration = 'FunctionDeclaration',
  AssignmentStatement = 'AssignmentStatement',
  CompoundAssignmentStatement = 'CompoundAssignmentStatement',
  FunctionCallStatement = 'FunctionCallStatement',
  PassSelfFunctionCallStatement = 'PassSelfFunctionCallStatement',
  ReturnStatement = 'ReturnStatement',
  DoStatement = 'DoStatement',
  WhileStatement = 'WhileStatement',
  RepeatStatement = 'RepeatStatement',
  ForStatement = 'ForStatement',
  ForInStatement = 'ForInStatement',
  IfStatement = 'IfStatement',
  BreakStatement = 'BreakStatement',
  ContinueStatement = 'ContinueStatement',

  // assignment targets
  AssignmentVariable = 'AssignmentVariable',
  AssignmentIndexing = 'AssignmentIndexing',

  // expressions
  BooleanExpression = 'BooleanExpression',
  NumberExpression = 'NumberExpression',
  StringExpression = 'StringExpression',
  NilExpression = 'NilExpression',
  VarargExpression = 'VarargExpression',
  BinaryExpression = 'BinaryExpression',
  UnaryExpression = 'UnaryExpression',
  ParenthesizedExpression = 'ParenthesizedExpression',
  IndexExpression = 'IndexExpression',
  FunctionCallExpression = 'FunctionCallExpression',
  PassSelfFunctionCallExpression = 'PassSelfFunctionCallExpression',
  VariableExpression = 'VariableExpression',
  FunctionLiteralExpression = 'FunctionLiteralExpression',
  TableConstructorExpression = 'TableConstructorExpression',

  // table constructor entries
  TableEntry = 'TableEntry',
  KeyedTableEntry = 'KeyedTableEntry',
}
