export { validateDocument } from './validate-document';
export { extractEntitiesTopics } from './extract-entities-topics';
export { extractEventsStatements } from './extract-events-statements';
