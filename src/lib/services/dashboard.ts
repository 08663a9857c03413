/**
 * Dashboard Service
 * Balance, traffic light, notifications and period totals for one employee
 */

import type { Employee, FlexOverview, FlexTimeRollups, Notification, TrafficLight } from '../../types';
import { roundHours } from '../utils/dates';
import { renderNotification } from './notification-text';

/**
 * green at or above the green threshold, red at or below the red one, yellow in between
 */
export function getTrafficLight(balance: number, green: number, red: number): TrafficLight {
  if (balance >= green) return 'green';
  if (balance > red) return 'yellow';
  return 'red';
}

export function buildOverview(
  employee: Employee,
  notifications: Notification[],
  rollups: FlexTimeRollups
): FlexOverview {
  return {
    employeeId: employee.id,
    name: employee.name,
    balance: roundHours(employee.flexBalance),
    trafficLight: getTrafficLight(employee.flexBalance, employee.greenThreshold, employee.redThreshold),
    notifications: notifications.filter(notification => !notification.isPopup).map(renderNotification),
    rollups,
  };
}

/**
 * Count employees per traffic-light color, e.g. for a supervisor's team view
 */
export function countTrafficLights(employees: Employee[]): Record<TrafficLight, number> {
  const counts: Record<TrafficLight, number> = { green: 0, yellow: 0, red: 0 };
  for (const employee of employees) {
    counts[getTrafficLight(employee.flexBalance, employee.greenThreshold, employee.redThreshold)]++;
  }
  return counts;
}
