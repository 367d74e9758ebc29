export {
  HealthMonitorService,
  type IHealthMonitorService,
  type HealthCheckReport,
  type HealthMonitorStatus
} from './health-monitor.service';
export { PollingWorkerService, type IPollingWorkerService, type PollingWorkerStatus } from './polling-worker.service';
