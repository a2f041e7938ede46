/**
 * Appointment Service Tests
 *
 * Booking rules, meeting and e-mail side effects, and the lifecycle
 * transitions (confirm, cancel, reschedule, no-show).
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  AuthorizationError,
  ConflictError,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import {
  NO_EMAIL_PATIENT_ID,
  OTHER_PATIENT_ID,
  PATIENT_ID,
  PROVIDER_ID,
  TUESDAY,
  addWindow,
  admin,
  at,
  book,
  createHarness,
  otherPatient,
  otherProvider,
  patient,
  provider,
  type Harness,
} from './fixtures';

describe('AppointmentService', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = createHarness();
    await addWindow(harness, 1, '09:00', '17:00');
  });

  // ==========================================================================
  // BOOKING
  // ==========================================================================

  describe('createAppointment', () => {
    it('books a video consultation with its meeting and confirmation e-mail', async () => {
      const { appointment, consultation } = await book(harness, TUESDAY, '10:00', '11:00');

      expect(appointment.status).toBe('scheduled');
      expect(appointment.scheduledTime).toEqual(at(TUESDAY, '10:00'));
      expect(appointment.reminderSent).toBe(false);

      expect(consultation?.appointmentId).toBe(appointment.id);
      expect(consultation?.meetingId).toBe('mtg-1');
      expect(consultation?.meetingPassword).toBe('pw-mtg-1');
      expect(consultation?.joinUrl).toBe('https://meet.example.test/j/mtg-1');

      expect(harness.meetings.created).toEqual([
        {
          topic: 'Medical Consultation - Alex Smith and Jane Roe',
          start: at(TUESDAY, '10:00'),
          durationMinutes: 60,
          hostEmail: 'dr.smith@example.test',
        },
      ]);

      expect(harness.mailer.sent).toHaveLength(1);
      expect(harness.mailer.sent[0].to).toBe('"Jane Roe" <jane@example.test>');
      expect(harness.mailer.sent[0].subject).toBe('Appointment Confirmation: Video Consultation with Dr. Smith');

      expect(await harness.store.outbox.listDispatchable(50, 5)).toEqual([]);
    });

    it('books other kinds without a consultation', async () => {
      const { appointment, consultation } = await book(harness, TUESDAY, '10:00', '10:30', 'in_person');

      expect(consultation).toBeNull();
      expect(harness.meetings.created).toEqual([]);
      expect(harness.mailer.sent[0].subject).toBe('Appointment Confirmation: In-Person Visit with Dr. Smith');
      expect(await harness.store.consultations.findByAppointmentId(appointment.id)).toBeNull();
    });

    it('keeps the booking when the meeting provider fails', async () => {
      harness.meetings.failing = true;

      const { appointment, consultation } = await book(harness, TUESDAY, '10:00', '11:00');

      expect(appointment.status).toBe('scheduled');
      expect(consultation?.meetingId).toBeNull();
      expect(consultation?.joinUrl).toBeNull();

      const pending = await harness.store.outbox.listDispatchable(50, 5);
      expect(pending).toHaveLength(1);
      expect(pending[0]).toMatchObject({
        type: 'meeting.create',
        status: 'failed',
        attempts: 1,
        lastError: 'meeting provider unavailable',
      });
    });

    it('rejects a range overlapping an active appointment', async () => {
      const first = await book(harness, TUESDAY, '10:00', '11:00');

      await expect(book(harness, TUESDAY, '10:30', '11:30')).rejects.toMatchObject({
        statusCode: 409,
        errorCode: 'CONFLICT',
        details: [
          {
            code: 'overlap',
            message: 'Appointment overlaps with existing appointment from 10:00 to 11:00',
            context: {
              appointmentId: first.appointment.id,
              start: '2030-01-08T10:00:00.000Z',
              end: '2030-01-08T11:00:00.000Z',
            },
          },
        ],
      });
    });

    it('accepts a back-to-back appointment', async () => {
      await book(harness, TUESDAY, '10:00', '11:00');
      const { appointment } = await book(harness, TUESDAY, '11:00', '11:30');

      expect(appointment.scheduledTime).toEqual(at(TUESDAY, '11:00'));
    });

    it('rejects a range outside the weekly windows', async () => {
      await expect(book(harness, TUESDAY, '16:30', '17:30')).rejects.toMatchObject({
        details: [{ code: 'outside_availability' }],
      });
    });

    it('rejects a range during time-off', async () => {
      await harness.services.calendar.addTimeOff(provider, {
        startDate: '2030-01-08T12:00:00Z',
        endDate: '2030-01-08T13:00:00Z',
        reason: 'Training',
      });

      await expect(book(harness, TUESDAY, '12:30', '13:30')).rejects.toMatchObject({
        details: [{ code: 'time_off', message: 'Provider is unavailable: Training' }],
      });
    });

    it('books exactly one of two concurrent requests for the same slot', async () => {
      const results = await Promise.allSettled([
        book(harness, TUESDAY, '10:00', '11:00'),
        book(harness, TUESDAY, '10:00', '11:00'),
      ]);

      const fulfilled = results.filter((result) => result.status === 'fulfilled');
      const rejected = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(ConflictError);
      expect(await harness.store.appointments.listActiveInRange(PROVIDER_ID, at(TUESDAY, '00:00'), at(TUESDAY, '23:59'))).toHaveLength(1);
    });

    it('keeps the winning booking meeting when concurrent requests are rejected', async () => {
      const results = await Promise.allSettled([
        book(harness, TUESDAY, '10:00', '11:00'),
        book(harness, TUESDAY, '10:00', '11:00'),
        book(harness, TUESDAY, '10:00', '11:00'),
      ]);

      const [booked] = results.flatMap((result) => (result.status === 'fulfilled' ? [result.value] : []));
      const consultation = await harness.store.consultations.findByAppointmentId(booked.appointment.id);

      expect(harness.meetings.created).toHaveLength(1);
      expect(consultation?.meetingId).toBe('mtg-1');
      expect(await harness.store.outbox.listDispatchable(50, 5)).toEqual([]);

      await harness.services.outbox.processPending();
      expect(harness.meetings.created).toHaveLength(1);
    });

    it('rejects an end before the start', async () => {
      await expect(book(harness, TUESDAY, '11:00', '10:00')).rejects.toBeInstanceOf(ValidationError);
    });

    it('only lets patients book for themselves', async () => {
      await expect(
        harness.services.appointments.createAppointment(patient, {
          patientId: OTHER_PATIENT_ID,
          providerId: PROVIDER_ID,
          scheduledTime: '2030-01-08T10:00:00Z',
          endTime: '2030-01-08T11:00:00Z',
        })
      ).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('requires the provider to be a provider', async () => {
      await expect(
        harness.services.appointments.createAppointment(admin, {
          patientId: PATIENT_ID,
          providerId: OTHER_PATIENT_ID,
          scheduledTime: '2030-01-08T10:00:00Z',
          endTime: '2030-01-08T11:00:00Z',
        })
      ).rejects.toThrow('Provider not found');
    });

    it('rejects an unknown parent appointment', async () => {
      await expect(
        harness.services.appointments.createAppointment(patient, {
          patientId: PATIENT_ID,
          providerId: PROVIDER_ID,
          scheduledTime: '2030-01-08T10:00:00Z',
          endTime: '2030-01-08T11:00:00Z',
          parentAppointmentId: '99999999-9999-4999-8999-999999999999',
        })
      ).rejects.toThrow('Parent appointment not found');
    });

    it('books for a patient without e-mail and leaves the notice for retry', async () => {
      const { appointment } = await harness.services.appointments.createAppointment(admin, {
        patientId: NO_EMAIL_PATIENT_ID,
        providerId: PROVIDER_ID,
        scheduledTime: '2030-01-08T10:00:00Z',
        endTime: '2030-01-08T10:30:00Z',
        kind: 'phone_consultation',
      });

      expect(appointment.patientId).toBe(NO_EMAIL_PATIENT_ID);
      expect(harness.mailer.sent).toEqual([]);

      const pending = await harness.store.outbox.listDispatchable(50, 5);
      expect(pending.map((event) => event.lastError)).toEqual(['Appointment confirmed email was not delivered']);
    });
  });

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  describe('confirm', () => {
    it('confirms a scheduled appointment once', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '11:00');

      const confirmed = await harness.services.appointments.confirm(provider, appointment.id);
      expect(confirmed.status).toBe('confirmed');

      await expect(harness.services.appointments.confirm(provider, appointment.id)).rejects.toThrow(
        'Cannot confirm an appointment that is confirmed'
      );
    });
  });

  describe('cancel', () => {
    it('cancels, notifies and frees the slot', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '11:00');

      const cancelled = await harness.services.appointments.cancel(patient, appointment.id, 'Feeling better');

      expect(cancelled.status).toBe('cancelled');
      expect(harness.mailer.sent[1].subject).toBe('Appointment Cancelled: Your appointment with Dr. Smith');
      expect(await harness.services.calendar.resolveSlots(PROVIDER_ID, TUESDAY)).toHaveLength(16);
    });

    it('refuses to cancel twice', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '11:00');
      await harness.services.appointments.cancel(patient, appointment.id);

      const attempt = harness.services.appointments.cancel(patient, appointment.id);

      await expect(attempt).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(attempt).rejects.toThrow('Cannot cancel an appointment that is cancelled');
    });

    it('keeps other patients out', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '11:00');

      await expect(harness.services.appointments.cancel(otherPatient, appointment.id)).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });
  });

  describe('reschedule', () => {
    it('links a new appointment and moves the consultation and meeting', async () => {
      const booked = await book(harness, TUESDAY, '10:00', '11:00');

      const { appointment, previous, consultation } = await harness.services.appointments.reschedule(
        patient,
        booked.appointment.id,
        { scheduledTime: '2030-01-08T14:00:00Z', endTime: '2030-01-08T15:00:00Z' }
      );

      expect(previous.status).toBe('rescheduled');
      expect(previous.scheduledTime).toEqual(at(TUESDAY, '10:00'));
      expect(appointment.status).toBe('scheduled');
      expect(appointment.parentAppointmentId).toBe(previous.id);
      expect(appointment.reason).toBe('Check-up');
      expect(consultation?.id).toBe(booked.consultation?.id);
      expect(consultation?.appointmentId).toBe(appointment.id);

      expect(harness.meetings.updated).toEqual([
        { meetingId: 'mtg-1', update: { start: at(TUESDAY, '14:00'), durationMinutes: 60 } },
      ]);
      expect(harness.mailer.sent[1].subject).toBe('Appointment Rescheduled: Your appointment with Dr. Smith');

      const details = await harness.services.appointments.getAppointment(patient, previous.id);
      expect(details.followUps.map((followUp) => followUp.id)).toEqual([appointment.id]);
    });

    it('may overlap the range it replaces', async () => {
      const booked = await book(harness, TUESDAY, '10:00', '11:00');

      const { appointment } = await harness.services.appointments.reschedule(patient, booked.appointment.id, {
        scheduledTime: '2030-01-08T10:30:00Z',
        endTime: '2030-01-08T11:30:00Z',
      });

      expect(appointment.scheduledTime).toEqual(at(TUESDAY, '10:30'));
    });

    it('rolls back when the new range is taken', async () => {
      const booked = await book(harness, TUESDAY, '10:00', '11:00');
      await book(harness, TUESDAY, '14:00', '15:00');

      await expect(
        harness.services.appointments.reschedule(patient, booked.appointment.id, {
          scheduledTime: '2030-01-08T14:30:00Z',
          endTime: '2030-01-08T15:30:00Z',
        })
      ).rejects.toBeInstanceOf(ConflictError);

      const unchanged = await harness.store.appointments.findById(booked.appointment.id);
      expect(unchanged?.status).toBe('scheduled');
    });

    it('refuses a cancelled appointment', async () => {
      const booked = await book(harness, TUESDAY, '10:00', '11:00');
      await harness.services.appointments.cancel(patient, booked.appointment.id);

      await expect(
        harness.services.appointments.reschedule(patient, booked.appointment.id, {
          scheduledTime: '2030-01-08T14:00:00Z',
          endTime: '2030-01-08T15:00:00Z',
        })
      ).rejects.toThrow('Cannot reschedule an appointment that is cancelled');
    });
  });

  describe('markNoShow', () => {
    it('is reserved for the provider', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '11:00');

      await expect(harness.services.appointments.markNoShow(patient, appointment.id)).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(harness.services.appointments.markNoShow(otherProvider, appointment.id)).rejects.toBeInstanceOf(
        AuthorizationError
      );

      const updated = await harness.services.appointments.markNoShow(provider, appointment.id);
      expect(updated.status).toBe('no_show');
    });
  });

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  describe('upcoming', () => {
    it('lists future scheduled and confirmed appointments in order', async () => {
      const afternoon = await book(harness, TUESDAY, '14:00', '15:00');
      const morning = await book(harness, TUESDAY, '10:00', '11:00');
      const cancelled = await book(harness, TUESDAY, '15:00', '15:30');
      await harness.services.appointments.cancel(patient, cancelled.appointment.id);

      const ids = (await harness.services.appointments.upcoming(patient)).map((row) => row.id);
      expect(ids).toEqual([morning.appointment.id, afternoon.appointment.id]);

      expect(await harness.services.appointments.upcoming(provider)).toHaveLength(2);
      expect(await harness.services.appointments.upcoming(otherPatient)).toEqual([]);

      harness.clock.set(at(TUESDAY, '12:00'));
      const later = (await harness.services.appointments.upcoming(patient)).map((row) => row.id);
      expect(later).toEqual([afternoon.appointment.id]);
    });
  });

  describe('getAppointment', () => {
    it('returns the appointment with its consultation to participants', async () => {
      const booked = await book(harness, TUESDAY, '10:00', '11:00');

      const details = await harness.services.appointments.getAppointment(provider, booked.appointment.id);

      expect(details.appointment.id).toBe(booked.appointment.id);
      expect(details.consultation?.meetingId).toBe('mtg-1');
      expect(details.followUps).toEqual([]);
    });

    it('hides the appointment from other providers', async () => {
      const booked = await book(harness, TUESDAY, '10:00', '11:00');

      await expect(
        harness.services.appointments.getAppointment(otherProvider, booked.appointment.id)
      ).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('reports an unknown appointment', async () => {
      await expect(
        harness.services.appointments.getAppointment(admin, '99999999-9999-4999-8999-999999999999')
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
