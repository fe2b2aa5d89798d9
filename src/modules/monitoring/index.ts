export { createMonitoringRouter, type MonitoringDeps } from './routes/monitoring.routes';
