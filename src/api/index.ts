export { buildServer, requirementsRequestSchema, type ServerOptions, startServer } from './server.js';
