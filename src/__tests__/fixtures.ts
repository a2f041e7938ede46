/**
 * Shared test doubles: a settable clock, an in-process meeting provider and
 * mailer, and a fully wired service container over the in-memory store.
 */

import { addMinutes } from 'date-fns';
import { InMemorySchedulingStore } from '../models';
import { createServices, type Services } from '../services';
import type { EmailOptions, Mailer } from '../services/emailService';
import { StaticIdentityDirectory } from '../services/identityService';
import type { MeetingDetails, MeetingProvider, MeetingRequest, MeetingUpdate } from '../services/meetingService';
import type { Actor, AppointmentKind, Identity } from '../types';

export const PATIENT_ID = '11111111-1111-4111-8111-111111111111';
export const PROVIDER_ID = '22222222-2222-4222-8222-222222222222';
export const OTHER_PATIENT_ID = '33333333-3333-4333-8333-333333333333';
export const OTHER_PROVIDER_ID = '44444444-4444-4444-8444-444444444444';
export const ADMIN_ID = '55555555-5555-4555-8555-555555555555';
export const NO_EMAIL_PATIENT_ID = '66666666-6666-4666-8666-666666666666';

export const patient: Actor = { id: PATIENT_ID, role: 'patient' };
export const provider: Actor = { id: PROVIDER_ID, role: 'provider' };
export const otherPatient: Actor = { id: OTHER_PATIENT_ID, role: 'patient' };
export const otherProvider: Actor = { id: OTHER_PROVIDER_ID, role: 'provider' };
export const admin: Actor = { id: ADMIN_ID, role: 'admin' };

export const people: Identity[] = [
  { id: PATIENT_ID, firstName: 'Jane', lastName: 'Roe', email: 'jane@example.test', role: 'patient' },
  { id: PROVIDER_ID, firstName: 'Alex', lastName: 'Smith', email: 'dr.smith@example.test', role: 'provider' },
  { id: OTHER_PATIENT_ID, firstName: 'Sam', lastName: 'Poe', email: 'sam@example.test', role: 'patient' },
  { id: OTHER_PROVIDER_ID, firstName: 'Kim', lastName: 'Lee', email: 'dr.lee@example.test', role: 'provider' },
  { id: ADMIN_ID, firstName: 'Ada', lastName: 'Admin', email: 'admin@example.test', role: 'admin' },
  { id: NO_EMAIL_PATIENT_ID, firstName: 'Nia', lastName: 'Noe', email: null, role: 'patient' },
];

/** 2030-01-08 is a Tuesday, 2030-01-09 a Wednesday */
export const TUESDAY = '2030-01-08';
export const WEDNESDAY = '2030-01-09';

export function at(date: string, time: string): Date {
  return new Date(`${date}T${time}:00.000Z`);
}

export class TestClock {
  constructor(public current: Date = new Date('2030-01-07T12:00:00.000Z')) {}

  readonly now = (): Date => new Date(this.current.getTime());

  set(value: Date): void {
    this.current = new Date(value.getTime());
  }

  advance(minutes: number): void {
    this.current = addMinutes(this.current, minutes);
  }
}

export class FakeMeetingProvider implements MeetingProvider {
  failing = false;
  created: MeetingRequest[] = [];
  updated: Array<{ meetingId: string; update: MeetingUpdate }> = [];
  deleted: string[] = [];
  private sequence = 0;

  async createMeeting(request: MeetingRequest): Promise<MeetingDetails> {
    if (this.failing) throw new Error('meeting provider unavailable');
    this.created.push(request);
    this.sequence++;
    return this.details(`mtg-${this.sequence}`);
  }

  async updateMeeting(meetingId: string, update: MeetingUpdate): Promise<void> {
    if (this.failing) throw new Error('meeting provider unavailable');
    this.updated.push({ meetingId, update });
  }

  async deleteMeeting(meetingId: string): Promise<void> {
    if (this.failing) throw new Error('meeting provider unavailable');
    this.deleted.push(meetingId);
  }

  async getMeeting(meetingId: string): Promise<MeetingDetails> {
    return this.details(meetingId);
  }

  private details(id: string): MeetingDetails {
    return {
      id,
      password: `pw-${id}`,
      joinUrl: `https://meet.example.test/j/${id}`,
      startUrl: `https://meet.example.test/s/${id}`,
    };
  }
}

export class FakeMailer implements Mailer {
  failing = false;
  sent: EmailOptions[] = [];

  async sendEmail(options: EmailOptions): Promise<boolean> {
    if (this.failing) return false;
    this.sent.push(options);
    return true;
  }
}

export interface Harness {
  clock: TestClock;
  store: InMemorySchedulingStore;
  identities: StaticIdentityDirectory;
  mailer: FakeMailer;
  meetings: FakeMeetingProvider;
  services: Services;
}

export function createHarness(): Harness {
  const clock = new TestClock();
  const store = new InMemorySchedulingStore({ now: clock.now });
  const identities = new StaticIdentityDirectory(people);
  const mailer = new FakeMailer();
  const meetings = new FakeMeetingProvider();
  const services = createServices({ store, identities, mailer, meetings, now: clock.now });

  return { clock, store, identities, mailer, meetings, services };
}

/**
 * Weekly window for a provider, stored directly
 */
export function addWindow(
  harness: Harness,
  dayOfWeek: number,
  startTime: string,
  endTime: string,
  providerId: string = PROVIDER_ID
) {
  return harness.store.availability.create({ providerId, dayOfWeek, startTime, endTime, isAvailable: true });
}

/**
 * Book through the service as the patient on the default provider's calendar
 */
export function book(harness: Harness, date: string, start: string, end: string, kind: AppointmentKind = 'video_consultation') {
  return harness.services.appointments.createAppointment(patient, {
    patientId: PATIENT_ID,
    providerId: PROVIDER_ID,
    scheduledTime: at(date, start).toISOString(),
    endTime: at(date, end).toISOString(),
    kind,
    reason: 'Check-up',
  });
}
