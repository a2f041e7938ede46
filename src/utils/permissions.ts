/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - APPOINTMENT ACCESS RULES
 * ============================================================================
 */

import type { Actor, Appointment } from '../types';
import { AuthorizationError } from './errors';

export type AppointmentRole = 'patient' | 'provider';

/**
 * The actor's part in an appointment, if any
 */
export function participantRole(actor: Actor, appointment: Appointment): AppointmentRole | null {
  if (actor.role === 'patient' && actor.id === appointment.patientId) return 'patient';
  if (actor.role === 'provider' && actor.id === appointment.providerId) return 'provider';
  return null;
}

/**
 * Patient, provider or an admin
 */
export function assertCanView(actor: Actor, appointment: Appointment): void {
  if (actor.role === 'admin' || participantRole(actor, appointment)) return;
  throw new AuthorizationError('You do not have access to this appointment');
}

/**
 * The appointment's provider or an admin
 */
export function assertCanManage(actor: Actor, appointment: Appointment): void {
  if (actor.role === 'admin' || participantRole(actor, appointment) === 'provider') return;
  throw new AuthorizationError('Only the appointment provider can perform this action');
}
