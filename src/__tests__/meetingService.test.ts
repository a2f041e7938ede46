/**
 * Meeting Provider Tests
 *
 * The axios instance is given an in-process adapter, so no request leaves
 * the test process.
 */

import axios, { type AxiosAdapter, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import jwt from 'jsonwebtoken';
import { beforeEach, describe, expect, it } from 'vitest';
import { ZoomMeetingProvider, formatMeetingTime } from '../services/meetingService';
import { ExternalServiceError } from '../utils/errors';

interface RecordedRequest {
  method: string | undefined;
  url: string | undefined;
  body: unknown;
  authorization: unknown;
}

interface StubReply {
  status: number;
  data?: unknown;
}

function createStubHttp(replies: StubReply[] | Error, recorded: RecordedRequest[]) {
  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    recorded.push({
      method: config.method,
      url: config.url,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      authorization: config.headers.Authorization,
    });

    if (replies instanceof Error) {
      throw replies;
    }

    const reply = replies.shift() ?? { status: 500 };
    return { data: reply.data ?? '', status: reply.status, statusText: '', headers: {}, config };
  };

  return axios.create({ baseURL: 'https://meetings.example.test/v2', adapter });
}

const meetingBody = {
  id: 987654321,
  password: 'pw123',
  join_url: 'https://meetings.example.test/j/987654321',
  start_url: 'https://meetings.example.test/s/987654321',
};

describe('ZoomMeetingProvider', () => {
  let recorded: RecordedRequest[];

  const providerWith = (replies: StubReply[] | Error, credentials = { apiKey: 'test-key', apiSecret: 'test-secret' }) =>
    new ZoomMeetingProvider({
      baseUrl: 'https://meetings.example.test/v2',
      timeout: 1000,
      tokenTtlSeconds: 60,
      ...credentials,
      http: createStubHttp(replies, recorded),
    });

  beforeEach(() => {
    recorded = [];
  });

  it('formats start times without milliseconds', () => {
    expect(formatMeetingTime(new Date('2030-01-08T10:00:00.000Z'))).toBe('2030-01-08T10:00:00Z');
  });

  it('creates a scheduled meeting with hardened settings', async () => {
    const provider = providerWith([{ status: 201, data: meetingBody }]);

    const meeting = await provider.createMeeting({
      topic: 'Medical Consultation - Alex Smith and Jane Roe',
      start: new Date('2030-01-08T10:00:00.000Z'),
      durationMinutes: 60,
      hostEmail: 'dr.smith@example.test',
    });

    expect(meeting).toEqual({
      id: '987654321',
      password: 'pw123',
      joinUrl: 'https://meetings.example.test/j/987654321',
      startUrl: 'https://meetings.example.test/s/987654321',
    });

    expect(recorded).toHaveLength(1);
    expect(recorded[0].method).toBe('post');
    expect(recorded[0].url).toBe('/users/dr.smith%40example.test/meetings');
    expect(recorded[0].body).toMatchObject({
      topic: 'Medical Consultation - Alex Smith and Jane Roe',
      type: 2,
      start_time: '2030-01-08T10:00:00Z',
      duration: 60,
      timezone: 'UTC',
      settings: { waiting_room: true, join_before_host: false },
    });
  });

  it('signs each request with the API secret', async () => {
    const provider = providerWith([{ status: 201, data: meetingBody }]);

    await provider.createMeeting({
      topic: 'Consultation',
      start: new Date('2030-01-08T10:00:00.000Z'),
      durationMinutes: 30,
      hostEmail: 'dr.smith@example.test',
    });

    const header = String(recorded[0].authorization);
    expect(header.startsWith('Bearer ')).toBe(true);
    expect(jwt.verify(header.slice('Bearer '.length), 'test-secret')).toMatchObject({ iss: 'test-key' });
  });

  it('sends only the changed fields on update', async () => {
    const provider = providerWith([{ status: 204 }]);

    await provider.updateMeeting('987654321', { start: new Date('2030-01-08T14:00:00.000Z'), durationMinutes: 45 });

    expect(recorded[0].method).toBe('patch');
    expect(recorded[0].url).toBe('/meetings/987654321');
    expect(recorded[0].body).toEqual({ start_time: '2030-01-08T14:00:00Z', duration: 45 });
  });

  it('sends a zero-minute duration', async () => {
    const provider = providerWith([{ status: 204 }]);

    await provider.updateMeeting('987654321', { durationMinutes: 0 });

    expect(recorded[0].body).toEqual({ duration: 0 });
  });

  it('deletes a meeting', async () => {
    const provider = providerWith([{ status: 204 }]);

    await provider.deleteMeeting('987654321');

    expect(recorded[0].method).toBe('delete');
    expect(recorded[0].url).toBe('/meetings/987654321');
  });

  it('reads a meeting back', async () => {
    const provider = providerWith([{ status: 200, data: { ...meetingBody, id: 'abc' } }]);

    expect((await provider.getMeeting('abc')).id).toBe('abc');
  });

  it('rejects an unexpected status', async () => {
    const provider = providerWith([{ status: 400, data: { message: 'Invalid field' } }]);

    await expect(provider.deleteMeeting('987654321')).rejects.toThrow('Failed to delete meeting: HTTP 400');
  });

  it('rejects a malformed meeting body', async () => {
    const provider = providerWith([{ status: 201, data: { id: 1 } }]);

    await expect(
      provider.createMeeting({ topic: 'x', start: new Date(), durationMinutes: 30, hostEmail: 'dr.smith@example.test' })
    ).rejects.toThrow('Meeting provider returned an unexpected response');
  });

  it('wraps transport failures', async () => {
    const provider = providerWith(new Error('socket hang up'));

    const attempt = provider.deleteMeeting('987654321');

    await expect(attempt).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(attempt).rejects.toThrow('socket hang up');
  });

  it('refuses to call without credentials', async () => {
    const provider = providerWith([{ status: 204 }], { apiKey: '', apiSecret: '' });

    await expect(provider.deleteMeeting('987654321')).rejects.toThrow(
      'Meeting provider credentials are not configured'
    );
    expect(recorded).toEqual([]);
  });
});
