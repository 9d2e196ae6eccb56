export type { ParsedStatement, ParseFailure, ParseOutcome, SqlParser } from './types.js'
export { NodeSqlParser, databaseFor, tablesFromList, columnsFromList } from './node-sql-parser.js'
export {
  EMPTY_FACTS,
  createAstFacts,
  inferStatementKind,
  kindFromNodeType,
  type AstFacts,
  type AstNode,
  type TableReference
} from './facts.js'
