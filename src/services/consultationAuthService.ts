/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - CONSULTATION ACCESS CODES
 * ============================================================================
 *
 * Short-lived numeric codes e-mailed to the patient as a second factor for
 * joining a video consultation. A code is single use.
 */

import { addMinutes, differenceInMinutes } from 'date-fns';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';
import type { SchedulingStore } from '../models';
import type { Actor, Appointment, Consultation } from '../types';
import { AuthorizationError, NotFoundError } from '../utils/errors';
import { codesMatch, generateAccessCode } from '../utils/generators';
import { participantRole } from '../utils/permissions';
import { accessCodeSchema, parseInput } from '../utils/validation';
import type { IdentityDirectory } from './identityService';
import type { NotificationService } from './notificationService';

const log = logger.child('access-codes');

export interface ConsultationAuthServiceDeps {
  store: SchedulingStore;
  identities: IdentityDirectory;
  notifications: NotificationService;
  now?: () => Date;
  codeLength?: number;
  ttlMinutes?: number;
}

export class ConsultationAuthService {
  private readonly store: SchedulingStore;
  private readonly identities: IdentityDirectory;
  private readonly notifications: NotificationService;
  private readonly now: () => Date;
  private readonly codeLength: number;
  private readonly ttlMinutes: number;

  constructor(deps: ConsultationAuthServiceDeps) {
    this.store = deps.store;
    this.identities = deps.identities;
    this.notifications = deps.notifications;
    this.now = deps.now ?? (() => new Date());
    this.codeLength = deps.codeLength ?? config.scheduling.accessCode.length;
    this.ttlMinutes = deps.ttlMinutes ?? config.scheduling.accessCode.ttlMinutes;
  }

  /**
   * E-mail an access code to the patient. An unexpired code is sent again
   * instead of generating a new one. Returns whether the e-mail went out.
   */
  async requestAccessCode(actor: Actor, consultationId: string): Promise<boolean> {
    const { consultation, appointment } = await this.load(this.store, consultationId);

    if (!participantRole(actor, appointment)) {
      throw new AuthorizationError('Only the patient or provider can request an access code');
    }

    const patient = await this.identities.findById(appointment.patientId);
    if (!patient?.email) {
      log.warn('Access code not sent: patient has no email address', { consultationId });
      return false;
    }

    const now = this.now();
    let code = consultation.accessCode;
    let expires = consultation.accessCodeExpires;

    if (!code || !expires || expires.getTime() <= now.getTime()) {
      code = generateAccessCode(this.codeLength);
      expires = addMinutes(now, this.ttlMinutes);
      await this.store.consultations.update(consultationId, { accessCode: code, accessCodeExpires: expires });
    }

    const remaining = Math.max(1, differenceInMinutes(expires, now));

    try {
      const sent = await this.notifications.sendAccessCode(appointment, code, remaining);
      log.info('Access code requested', { consultationId, requestedBy: actor.id, sent });
      return sent;
    } catch (error) {
      log.error('Failed to send access code', { consultationId, error: errorMessage(error) });
      return false;
    }
  }

  /**
   * True when the code matches and has not expired; the code is then consumed.
   * A failed attempt leaves the stored code in place.
   */
  async verifyAccessCode(consultationId: string, submitted: string): Promise<boolean> {
    const { code } = parseInput(accessCodeSchema, { code: submitted });

    const verified = await this.store.transaction(async (tx) => {
      const { consultation } = await this.load(tx, consultationId);
      const { accessCode, accessCodeExpires } = consultation;

      if (!accessCode || !accessCodeExpires) return false;
      if (!codesMatch(accessCode, code)) return false;
      if (this.now().getTime() >= accessCodeExpires.getTime()) return false;

      await tx.consultations.update(consultationId, { accessCode: null, accessCodeExpires: null });
      return true;
    });

    log.info('Access code verification', { consultationId, verified });
    return verified;
  }

  private async load(
    tx: SchedulingStore,
    consultationId: string
  ): Promise<{ consultation: Consultation; appointment: Appointment }> {
    const consultation = await tx.consultations.findById(consultationId);
    if (!consultation) {
      throw new NotFoundError('Consultation');
    }
    const appointment = await tx.appointments.findById(consultation.appointmentId);
    if (!appointment) {
      throw new NotFoundError('Appointment');
    }
    return { consultation, appointment };
  }
}
