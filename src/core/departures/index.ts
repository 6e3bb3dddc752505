/**
 * Departures Module
 */

export { DepartureService } from './service';
export type { ScheduleResult, LiveResult, DepartureServiceOptions } from './service';
