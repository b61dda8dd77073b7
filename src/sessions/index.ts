export { createSessionStore, SESSION_COLUMNS, type SessionStore } from './persistence';
export { buildSessionRecord, type SessionRecordOptions } from './records';
export { summarizeSessions, sortByTimestamp } from './summary';
