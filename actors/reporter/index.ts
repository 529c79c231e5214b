export {
  DEFAULT_TOP_RATED,
  generateInsights,
  type InsightReport,
} from './insights';
export { formatInsightReport, logInsightReport, truncate } from './report';
