/**
 * Monitoring Bounded Context
 *
 * Health probes for storage, messaging and the job scheduler.
 */

export {
	type ComponentHealth,
	type ComponentName,
	HealthMonitor,
	type HealthMonitorDeps,
	type HealthVerdict,
} from "./health-monitor.js";
