export {
  StatementService,
  StatementReport,
  AccountStatement,
  StatementFold,
  StatementPeriod,
  foldStatement,
  foldSummary,
  MovementsSummary,
  SummaryFold,
  SummaryScope,
  toStatementPeriod,
} from './statement.service';
export { StatementController } from './statement.controller';
export { createStatementRoutes } from './statement.routes';
