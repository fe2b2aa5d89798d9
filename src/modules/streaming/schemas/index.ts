export { StreamRequestSchema, formatValidationIssues } from './stream-request.schema';
