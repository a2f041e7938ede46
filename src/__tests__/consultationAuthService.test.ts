/**
 * Consultation Access Code Tests
 */

import { addMinutes } from 'date-fns';
import { beforeEach, describe, expect, it } from 'vitest';
import { AuthorizationError, ValidationError } from '../utils/errors';
import {
  NO_EMAIL_PATIENT_ID,
  PROVIDER_ID,
  TUESDAY,
  addWindow,
  admin,
  book,
  createHarness,
  otherPatient,
  patient,
  provider,
  type Harness,
} from './fixtures';

const REQUESTED_AT = new Date('2030-01-07T12:00:00.000Z');

describe('ConsultationAuthService', () => {
  let harness: Harness;
  let consultationId: string;

  async function storedCode(): Promise<{ code: string | null; expires: Date | null }> {
    const consultation = await harness.store.consultations.findById(consultationId);
    return { code: consultation?.accessCode ?? null, expires: consultation?.accessCodeExpires ?? null };
  }

  async function requestCode(): Promise<string> {
    expect(await harness.services.accessCodes.requestAccessCode(patient, consultationId)).toBe(true);
    const { code } = await storedCode();
    if (!code) {
      throw new Error('expected an access code to be stored');
    }
    return code;
  }

  beforeEach(async () => {
    harness = createHarness();
    await addWindow(harness, 1, '09:00', '17:00');
    const { consultation } = await book(harness, TUESDAY, '10:00', '11:00');
    consultationId = consultation?.id ?? '';
  });

  describe('requestAccessCode', () => {
    it('stores a six digit code valid for 15 minutes and e-mails it', async () => {
      const code = await requestCode();

      expect(code).toMatch(/^\d{6}$/);
      expect((await storedCode()).expires).toEqual(addMinutes(REQUESTED_AT, 15));

      const email = harness.mailer.sent[harness.mailer.sent.length - 1];
      expect(email.to).toBe('"Jane Roe" <jane@example.test>');
      expect(email.subject).toBe('Access Code for Your Video Consultation with Dr. Smith');
      expect(email.text).toBe(
        `Dear Jane,\n\nYour access code for the video consultation with Dr. Smith is ${code}. It expires in 15 minutes and can be used once.`
      );
    });

    it('sends the same code again while it is valid', async () => {
      const first = await requestCode();

      harness.clock.advance(5);
      const second = await requestCode();

      expect(second).toBe(first);
      expect((await storedCode()).expires).toEqual(addMinutes(REQUESTED_AT, 15));
      expect(harness.mailer.sent[harness.mailer.sent.length - 1].text).toContain('It expires in 10 minutes');
    });

    it('issues a fresh expiry once the old code lapsed', async () => {
      await requestCode();

      harness.clock.advance(20);
      await requestCode();

      expect((await storedCode()).expires).toEqual(addMinutes(REQUESTED_AT, 35));
    });

    it('may be requested by the provider for the patient', async () => {
      expect(await harness.services.accessCodes.requestAccessCode(provider, consultationId)).toBe(true);
    });

    it('is limited to the participants', async () => {
      await expect(harness.services.accessCodes.requestAccessCode(otherPatient, consultationId)).rejects.toBeInstanceOf(
        AuthorizationError
      );
      await expect(harness.services.accessCodes.requestAccessCode(admin, consultationId)).rejects.toBeInstanceOf(
        AuthorizationError
      );
    });

    it('returns false when the patient has no e-mail address', async () => {
      const { consultation } = await harness.services.appointments.createAppointment(admin, {
        patientId: NO_EMAIL_PATIENT_ID,
        providerId: PROVIDER_ID,
        scheduledTime: '2030-01-08T14:00:00Z',
        endTime: '2030-01-08T15:00:00Z',
      });
      consultationId = consultation?.id ?? '';

      expect(await harness.services.accessCodes.requestAccessCode(provider, consultationId)).toBe(false);
      expect(await storedCode()).toEqual({ code: null, expires: null });
    });

    it('returns false when the e-mail is not delivered', async () => {
      harness.mailer.failing = true;

      expect(await harness.services.accessCodes.requestAccessCode(patient, consultationId)).toBe(false);
    });
  });

  describe('verifyAccessCode', () => {
    it('accepts the code within its lifetime and consumes it', async () => {
      const code = await requestCode();

      harness.clock.advance(14);

      expect(await harness.services.accessCodes.verifyAccessCode(consultationId, code)).toBe(true);
      expect(await storedCode()).toEqual({ code: null, expires: null });
      expect(await harness.services.accessCodes.verifyAccessCode(consultationId, code)).toBe(false);
    });

    it('rejects an expired code and keeps it stored', async () => {
      const code = await requestCode();

      harness.clock.advance(16);

      expect(await harness.services.accessCodes.verifyAccessCode(consultationId, code)).toBe(false);
      expect((await storedCode()).code).toBe(code);
    });

    it('rejects a code at the exact expiry instant', async () => {
      const code = await requestCode();

      harness.clock.advance(15);

      expect(await harness.services.accessCodes.verifyAccessCode(consultationId, code)).toBe(false);
    });

    it('rejects a wrong code and keeps the real one', async () => {
      const code = await requestCode();

      expect(await harness.services.accessCodes.verifyAccessCode(consultationId, 'abcdef')).toBe(false);
      expect((await storedCode()).code).toBe(code);
      expect(await harness.services.accessCodes.verifyAccessCode(consultationId, code)).toBe(true);
    });

    it('rejects any code before one was requested', async () => {
      expect(await harness.services.accessCodes.verifyAccessCode(consultationId, '123456')).toBe(false);
    });

    it('requires a code', async () => {
      await expect(harness.services.accessCodes.verifyAccessCode(consultationId, '   ')).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });
});
