export {
  createServer,
  type ServerDeps,
  type StopSummary,
  type TandemServer,
} from './server.js'
