export { AnalysisController } from './analysis.controller';
