/**
 * ============================================================================
 * TELEHEALTH SCHEDULER - MEETING PROVIDER
 * ============================================================================
 *
 * Client for a Zoom-compatible REST API. Each request carries a short-lived
 * HS256 bearer token signed with the API secret.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { config } from '../config/config';
import logger, { errorMessage } from '../config/logger';
import { ExternalServiceError } from '../utils/errors';
import { generateMeetingPassword } from '../utils/generators';

const log = logger.child('meetings');

const SERVICE_NAME = 'meeting-provider';

export interface MeetingRequest {
  topic: string;
  start: Date;
  durationMinutes: number;
  hostEmail: string;
}

export interface MeetingUpdate {
  topic?: string;
  start?: Date;
  durationMinutes?: number;
}

export interface MeetingDetails {
  id: string;
  password: string | null;
  joinUrl: string;
  startUrl: string;
}

export interface MeetingProvider {
  createMeeting(request: MeetingRequest): Promise<MeetingDetails>;
  updateMeeting(meetingId: string, update: MeetingUpdate): Promise<void>;
  deleteMeeting(meetingId: string): Promise<void>;
  getMeeting(meetingId: string): Promise<MeetingDetails>;
}

export interface ZoomMeetingProviderOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  timeout: number;
  tokenTtlSeconds: number;
  /** Preconfigured axios instance */
  http?: AxiosInstance;
}

const meetingResponseSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
  password: z.string().optional(),
  join_url: z.string().url(),
  start_url: z.string().url(),
});

/** Settings applied to every consultation meeting */
export const HARDENED_MEETING_SETTINGS = {
  host_video: true,
  participant_video: true,
  join_before_host: false,
  mute_upon_entry: true,
  waiting_room: true,
  meeting_authentication: true,
  encryption_type: 'enhanced',
  audio: 'both',
  auto_recording: 'none',
} as const;

/** Zoom expects `YYYY-MM-DDTHH:mm:ssZ` */
export function formatMeetingTime(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export class ZoomMeetingProvider implements MeetingProvider {
  private readonly http: AxiosInstance;

  constructor(private readonly options: ZoomMeetingProviderOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeout,
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': 'Telehealth-Scheduler/1.0',
        },
      });
  }

  async createMeeting(request: MeetingRequest): Promise<MeetingDetails> {
    const response = await this.send('create meeting', () =>
      this.http.post(
        `/users/${encodeURIComponent(request.hostEmail)}/meetings`,
        {
          topic: request.topic,
          type: 2, // scheduled meeting
          start_time: formatMeetingTime(request.start),
          duration: request.durationMinutes,
          timezone: 'UTC',
          password: generateMeetingPassword(),
          settings: HARDENED_MEETING_SETTINGS,
          schedule_for: request.hostEmail,
        },
        this.requestConfig()
      )
    );

    this.expectStatus(response, 201, 'create meeting');
    const meeting = this.parseMeeting(response.data);

    log.info('Meeting created', { meetingId: meeting.id, durationMinutes: request.durationMinutes });
    return meeting;
  }

  async updateMeeting(meetingId: string, update: MeetingUpdate): Promise<void> {
    const body: Record<string, unknown> = {};
    if (update.topic !== undefined) body.topic = update.topic;
    if (update.start !== undefined) body.start_time = formatMeetingTime(update.start);
    if (update.durationMinutes !== undefined) body.duration = update.durationMinutes;

    const response = await this.send('update meeting', () =>
      this.http.patch(`/meetings/${encodeURIComponent(meetingId)}`, body, this.requestConfig())
    );

    this.expectStatus(response, 204, 'update meeting');
    log.info('Meeting updated', { meetingId });
  }

  async deleteMeeting(meetingId: string): Promise<void> {
    const response = await this.send('delete meeting', () =>
      this.http.delete(`/meetings/${encodeURIComponent(meetingId)}`, this.requestConfig())
    );

    this.expectStatus(response, 204, 'delete meeting');
    log.info('Meeting deleted', { meetingId });
  }

  async getMeeting(meetingId: string): Promise<MeetingDetails> {
    const response = await this.send('get meeting', () =>
      this.http.get(`/meetings/${encodeURIComponent(meetingId)}`, this.requestConfig())
    );

    this.expectStatus(response, 200, 'get meeting');
    return this.parseMeeting(response.data);
  }

  /**
   * Bearer token for one request
   */
  generateToken(): string {
    if (!this.options.apiKey || !this.options.apiSecret) {
      throw new ExternalServiceError(SERVICE_NAME, 'Meeting provider credentials are not configured');
    }

    return jwt.sign({ iss: this.options.apiKey }, this.options.apiSecret, {
      algorithm: 'HS256',
      expiresIn: this.options.tokenTtlSeconds,
    });
  }

  private requestConfig() {
    return {
      headers: { Authorization: `Bearer ${this.generateToken()}` },
      validateStatus: () => true,
    };
  }

  private async send(action: string, call: () => Promise<AxiosResponse<unknown>>): Promise<AxiosResponse<unknown>> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof ExternalServiceError) throw error;

      log.error(`Meeting provider request failed: ${action}`, { error: errorMessage(error) });
      throw new ExternalServiceError(SERVICE_NAME, `Failed to ${action}: ${errorMessage(error)}`);
    }
  }

  private expectStatus(response: AxiosResponse<unknown>, expected: number, action: string): void {
    if (response.status !== expected) {
      log.error(`Meeting provider rejected request: ${action}`, { statusCode: response.status });
      throw new ExternalServiceError(SERVICE_NAME, `Failed to ${action}: HTTP ${response.status}`);
    }
  }

  private parseMeeting(data: unknown): MeetingDetails {
    const parsed = meetingResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE_NAME, 'Meeting provider returned an unexpected response');
    }

    return {
      id: parsed.data.id,
      password: parsed.data.password ?? null,
      joinUrl: parsed.data.join_url,
      startUrl: parsed.data.start_url,
    };
  }
}

export function createMeetingProvider(): MeetingProvider {
  return new ZoomMeetingProvider({
    baseUrl: config.meeting.baseUrl,
    apiKey: config.meeting.apiKey,
    apiSecret: config.meeting.apiSecret,
    timeout: config.meeting.timeout,
    tokenTtlSeconds: config.meeting.tokenTtlSeconds,
  });
}
