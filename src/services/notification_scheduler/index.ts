/**
 * @file Milestone Notification Scheduler: public surface.
 */

export * from './models';
export { NotificationScheduler, type SchedulerDeps, type ScheduleTarget } from './scheduler';
export { DeliveryWorker, type DeliveryWorkerConfig, type TickSummary } from './worker';
export { MongoNotificationStore } from './notification_store';
export { PushGatewayTransport } from './push_transport';
export { createNotificationRouter, createHistoryHandlers } from './router';
export { nextOccurrence, occurrenceInYear } from './occurrence';
export { isQuietHour, deferPastQuietHours, resolveTimezone, deliveryInstant } from './quiet_hours';
export { buildPayload } from './payload';
