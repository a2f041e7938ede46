// ============================================================================
// TELEHEALTH SCHEDULER - DOMAIN TYPES
// ============================================================================

// ============================================================================
// ENUMS
// ============================================================================

export const APPOINTMENT_STATUSES = [
  'scheduled',
  'confirmed',
  'in_progress',
  'completed',
  'cancelled',
  'no_show',
  'rescheduled',
] as const;

export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

/** Statuses that hold a provider's time */
export const ACTIVE_STATUSES: readonly AppointmentStatus[] = ['scheduled', 'confirmed', 'in_progress'];

/** Statuses that count as upcoming and receive reminders */
export const UPCOMING_STATUSES: readonly AppointmentStatus[] = ['scheduled', 'confirmed'];

export const APPOINTMENT_KINDS = [
  'video_consultation',
  'phone_consultation',
  'in_person',
  'follow_up',
  'urgent_care',
  'specialist_referral',
] as const;

export type AppointmentKind = (typeof APPOINTMENT_KINDS)[number];

export const APPOINTMENT_KIND_LABELS: Record<AppointmentKind, string> = {
  video_consultation: 'Video Consultation',
  phone_consultation: 'Phone Consultation',
  in_person: 'In-Person Visit',
  follow_up: 'Follow-up',
  urgent_care: 'Urgent Care',
  specialist_referral: 'Specialist Referral',
};

export const RECURRENCE_PATTERNS = ['weekly', 'biweekly', 'monthly'] as const;

export type RecurrencePattern = (typeof RECURRENCE_PATTERNS)[number];

export type UserRole = 'patient' | 'provider' | 'admin';

// ============================================================================
// RECORDS
// ============================================================================

export interface ProviderAvailability {
  id: string;
  providerId: string;
  /** 0 = Monday .. 6 = Sunday */
  dayOfWeek: number;
  /** HH:mm */
  startTime: string;
  /** HH:mm */
  endTime: string;
  isAvailable: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface ProviderTimeOff {
  id: string;
  providerId: string;
  startDate: Date;
  endDate: Date;
  reason: string | null;
  createdAt: Date;
}

export interface Appointment {
  id: string;
  patientId: string;
  providerId: string;
  scheduledTime: Date;
  endTime: Date;
  status: AppointmentStatus;
  kind: AppointmentKind;
  reason: string;
  parentAppointmentId: string | null;
  isRecurring: boolean;
  recurrencePattern: RecurrencePattern | null;
  recurrenceEndDate: string | null;
  sendReminder: boolean;
  reminderSent: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface Consultation {
  id: string;
  appointmentId: string;
  startTime: Date | null;
  endTime: Date | null;
  durationMs: number | null;
  meetingId: string | null;
  meetingPassword: string | null;
  joinUrl: string | null;
  startUrl: string | null;
  accessCode: string | null;
  accessCodeExpires: Date | null;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type OutboxEventType = 'meeting.create' | 'meeting.update' | 'meeting.delete' | 'email.appointment';

export type OutboxStatus = 'pending' | 'done' | 'failed';

export type AppointmentNotice = 'confirmed' | 'cancelled' | 'rescheduled';

export interface OutboxPayloads {
  'meeting.create': { consultationId: string };
  'meeting.update': { consultationId: string };
  'meeting.delete': { meetingId: string };
  'email.appointment': { appointmentId: string; notice: AppointmentNotice };
}

export type OutboxEvent = {
  [K in OutboxEventType]: {
    id: string;
    type: K;
    payload: OutboxPayloads[K];
    status: OutboxStatus;
    attempts: number;
    lastError: string | null;
    createdAt: Date;
    processedAt: Date | null;
  };
}[OutboxEventType];

// ============================================================================
// COLLABORATOR SHAPES
// ============================================================================

export interface Identity {
  id: string;
  firstName: string;
  lastName: string;
  email: string | null;
  role: UserRole;
}

/** The caller of an operation */
export interface Actor {
  id: string;
  role: UserRole;
}

export interface Slot {
  /** HH:mm */
  start: string;
  /** HH:mm */
  end: string;
}

export interface JoinInfo {
  meetingId: string;
  meetingPassword: string | null;
  joinUrl: string | null;
  startUrl?: string | null;
}

export interface ReminderSweepResult {
  found: number;
  sent: number;
}
