/**
 * Consultation Service Tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import {
  AlreadyEndedError,
  AlreadyStartedError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  NotStartedError,
  ValidationError,
} from '../utils/errors';
import {
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

async function bookedConsultationId(harness: Harness): Promise<string> {
  const { consultation } = await book(harness, TUESDAY, '10:00', '11:00');
  if (!consultation) {
    throw new Error('expected a consultation for a video appointment');
  }
  return consultation.id;
}

describe('ConsultationService', () => {
  let harness: Harness;

  beforeEach(async () => {
    harness = createHarness();
    await addWindow(harness, 1, '09:00', '17:00');
  });

  describe('start and end', () => {
    it('records a 42 minute session and completes the appointment', async () => {
      const id = await bookedConsultationId(harness);
      const consultations = harness.services.consultations;

      harness.clock.set(at(TUESDAY, '10:00'));
      const started = await consultations.start(provider, id);

      expect(started.startTime).toEqual(at(TUESDAY, '10:00'));
      expect(started.durationMs).toBeNull();
      expect((await harness.store.appointments.findById(started.appointmentId))?.status).toBe('in_progress');

      harness.clock.advance(42);
      const ended = await consultations.end(provider, id);

      expect(ended.endTime).toEqual(at(TUESDAY, '10:42'));
      expect(ended.durationMs).toBe(2520000);
      expect((await harness.store.appointments.findById(ended.appointmentId))?.status).toBe('completed');
    });

    it('keeps sub-second precision in the duration', async () => {
      const id = await bookedConsultationId(harness);
      const consultations = harness.services.consultations;

      harness.clock.set(at(TUESDAY, '10:00'));
      await consultations.start(provider, id);
      harness.clock.set(new Date('2030-01-08T10:42:00.700Z'));
      const ended = await consultations.end(provider, id);

      expect(ended.durationMs).toBe(2520700);
      expect(ended.endTime).toEqual(new Date('2030-01-08T10:42:00.700Z'));
    });

    it('refuses to start twice', async () => {
      const id = await bookedConsultationId(harness);
      await harness.services.consultations.start(provider, id);

      await expect(harness.services.consultations.start(provider, id)).rejects.toBeInstanceOf(AlreadyStartedError);
    });

    it('refuses to end before starting', async () => {
      const id = await bookedConsultationId(harness);

      await expect(harness.services.consultations.end(provider, id)).rejects.toBeInstanceOf(NotStartedError);
    });

    it('refuses to end twice', async () => {
      const id = await bookedConsultationId(harness);
      await harness.services.consultations.start(provider, id);
      await harness.services.consultations.end(provider, id);

      await expect(harness.services.consultations.end(provider, id)).rejects.toBeInstanceOf(AlreadyEndedError);
    });

    it('is reserved for the appointment provider or an admin', async () => {
      const id = await bookedConsultationId(harness);

      await expect(harness.services.consultations.start(patient, id)).rejects.toBeInstanceOf(AuthorizationError);
      await expect(harness.services.consultations.start(otherProvider, id)).rejects.toBeInstanceOf(AuthorizationError);

      const started = await harness.services.consultations.start(admin, id);
      expect(started.startTime).not.toBeNull();
    });

    it('cannot start once the appointment is cancelled', async () => {
      const { appointment, consultation } = await book(harness, TUESDAY, '10:00', '11:00');
      await harness.services.appointments.cancel(patient, appointment.id);

      await expect(harness.services.consultations.start(provider, consultation?.id ?? '')).rejects.toMatchObject({
        errorCode: 'INVALID_TRANSITION',
        message: 'Cannot start a consultation for an appointment that is cancelled',
      });
    });

    it('reports an unknown consultation', async () => {
      await expect(
        harness.services.consultations.start(provider, '99999999-9999-4999-8999-999999999999')
      ).rejects.toThrow('Consultation not found');
    });
  });

  describe('createConsultation', () => {
    it('opens a consultation with a meeting for an existing appointment', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '10:30', 'follow_up');

      const consultation = await harness.services.consultations.createConsultation(provider, {
        appointmentId: appointment.id,
        notes: 'Review lab results',
      });

      expect(consultation.appointmentId).toBe(appointment.id);
      expect(consultation.notes).toBe('Review lab results');
      expect(consultation.meetingId).toBe('mtg-1');
      expect(harness.meetings.created[0].durationMinutes).toBe(30);
    });

    it('allows one consultation per appointment', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '11:00');

      await expect(
        harness.services.consultations.createConsultation(provider, { appointmentId: appointment.id })
      ).rejects.toBeInstanceOf(ConflictError);
    });

    it('is reserved for the provider', async () => {
      const { appointment } = await book(harness, TUESDAY, '10:00', '10:30', 'in_person');

      await expect(
        harness.services.consultations.createConsultation(patient, { appointmentId: appointment.id })
      ).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('validates the appointment id', async () => {
      await expect(
        harness.services.consultations.createConsultation(provider, { appointmentId: 'not-a-uuid' })
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('getConsultation and updateNotes', () => {
    it('shows the consultation to participants and admins only', async () => {
      const id = await bookedConsultationId(harness);

      expect((await harness.services.consultations.getConsultation(patient, id)).id).toBe(id);
      expect((await harness.services.consultations.getConsultation(admin, id)).id).toBe(id);
      await expect(harness.services.consultations.getConsultation(otherPatient, id)).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });

    it('lets the provider keep notes', async () => {
      const id = await bookedConsultationId(harness);

      const updated = await harness.services.consultations.updateNotes(provider, id, { notes: 'Follow up in two weeks' });
      expect(updated.notes).toBe('Follow up in two weeks');

      await expect(harness.services.consultations.updateNotes(patient, id, { notes: 'mine' })).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });
  });

  describe('deleteConsultation', () => {
    it('removes the consultation and releases its meeting', async () => {
      const id = await bookedConsultationId(harness);

      await harness.services.consultations.deleteConsultation(provider, id);

      expect(harness.meetings.deleted).toEqual(['mtg-1']);
      await expect(harness.services.consultations.getConsultation(provider, id)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('skips the meeting call when no meeting was created', async () => {
      harness.meetings.failing = true;
      const id = await bookedConsultationId(harness);
      harness.meetings.failing = false;

      await harness.services.consultations.deleteConsultation(provider, id);

      expect(harness.meetings.deleted).toEqual([]);
      expect(await harness.store.consultations.findById(id)).toBeNull();
    });
  });

  describe('joinInfo', () => {
    it('gives the patient the join link without the host link', async () => {
      const id = await bookedConsultationId(harness);

      expect(await harness.services.consultations.joinInfo(patient, id)).toEqual({
        meetingId: 'mtg-1',
        meetingPassword: 'pw-mtg-1',
        joinUrl: 'https://meet.example.test/j/mtg-1',
      });
    });

    it('gives the provider the host link too', async () => {
      const id = await bookedConsultationId(harness);

      const info = await harness.services.consultations.joinInfo(provider, id);
      expect(info.startUrl).toBe('https://meet.example.test/s/mtg-1');
    });

    it('is limited to the two participants', async () => {
      const id = await bookedConsultationId(harness);

      await expect(harness.services.consultations.joinInfo(admin, id)).rejects.toBeInstanceOf(AuthorizationError);
      await expect(harness.services.consultations.joinInfo(otherPatient, id)).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });

    it('reports a missing meeting', async () => {
      harness.meetings.failing = true;
      const id = await bookedConsultationId(harness);

      await expect(harness.services.consultations.joinInfo(patient, id)).rejects.toThrow('Meeting not found');
    });
  });
});
