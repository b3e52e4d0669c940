export { createHealthRoutes, type HealthRouteOptions } from './health.js';
export { createStatusRoutes } from './statuses.js';
export { createToothHistoryRoutes } from './tooth-history.js';
export { createChartRoutes } from './charts.js';
