export { TripPlanner, budgetWarning } from './planner.js';
export type { TripPlannerOptions } from './planner.js';
export * from './itinerary.js';
