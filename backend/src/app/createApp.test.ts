import { once } from 'events';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resolveAppConfig } from '../shared/config/appConfig.js';
import { isPlainObject } from '../shared/storage/recordMetadata.js';
import { createCollectionStores } from '../shared/storage/storeFactory.js';
import { createAppContext, type AppContext } from './appContext.js';
import { createApp } from './createApp.js';

type RequestOptions = {
  method?: string;
  body?: unknown;
  rawBody?: string;
  token?: string;
};

const readString = (body: unknown, key: string): string => {
  const value = isPlainObject(body) ? body[key] : undefined;
  if (typeof value !== 'string') {
    throw new Error(`Response has no string field "${key}".`);
  }
  return value;
};

const ivan = {
  name: 'Ivan Petrov',
  position: 'Backend Developer',
  experienceYears: 4,
  skills: ['Python', 'Django', 'PostgreSQL', 'Docker', 'Git'],
  education: 'MSU',
  languages: ['English'],
  contactInfo: { email: 'ivan@example.com', phone: '+7 900 000-00-00' }
};

const pythonJob = {
  title: 'Python Developer',
  requirements: ['3+ years with Python'],
  responsibilities: ['Build REST APIs'],
  skillsRequired: ['Python', 'Django', 'PostgreSQL', 'Docker', 'Redis'],
  experienceRequired: 3
};

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let context: AppContext;

  const request = async (path: string, options: RequestOptions = {}) => {
    const headers: Record<string, string> = {};
    let body: string | undefined = options.rawBody;
    if (options.body !== undefined) {
      body = JSON.stringify(options.body);
    }
    if (body !== undefined) {
      headers['content-type'] = 'application/json';
    }
    if (options.token) {
      headers.authorization = `Bearer ${options.token}`;
    }
    const response = await fetch(`${baseUrl}${path}`, { method: options.method ?? 'GET', headers, body });
    const payload: unknown = await response.json();
    return { status: response.status, body: payload };
  };

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const config = resolveAppConfig({ STORAGE_DRIVER: 'memory', ADMIN_USERNAME: 'admin' });
    context = createAppContext({ config, stores: createCollectionStores(config), analyzer: null });
    server = createApp(context).listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port.');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    vi.restoreAllMocks();
  });

  it('answers the health check', async () => {
    expect(await request('/health')).toEqual({ status: 200, body: { status: 'ok' } });
  });

  it('creates, reads, updates and deletes a résumé', async () => {
    const created = await request('/api/resumes', { method: 'POST', body: ivan });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject(ivan);
    const id = readString(created.body, 'id');

    expect((await request(`/api/resumes/${id}`)).body).toEqual(created.body);

    const patched = await request(`/api/resumes/${id}`, { method: 'PATCH', body: { position: 'Team Lead' } });
    expect(patched.status).toBe(200);
    expect(patched.body).toMatchObject({ ...ivan, position: 'Team Lead', id });

    expect(await request(`/api/resumes/${id}`, { method: 'DELETE' })).toEqual({ status: 200, body: { id } });
    expect(await request(`/api/resumes/${id}`)).toEqual({
      status: 404,
      body: { code: 'not-found', message: 'Résumé not found.' }
    });
  });

  it('rejects invalid bodies with field codes', async () => {
    expect(await request('/api/resumes', { method: 'POST', body: { position: 'QA', experienceYears: 1 } })).toEqual({
      status: 400,
      body: { code: 'missing-field', message: 'Field "name" is required.' }
    });
    expect(await request('/api/jobs', { method: 'POST', rawBody: '{"title":' })).toEqual({
      status: 400,
      body: { code: 'invalid-field', message: 'Request body is not valid JSON.' }
    });
  });

  it('runs an analysis with the mock scorer and lists it', async () => {
    const resumeId = readString((await request('/api/resumes', { method: 'POST', body: ivan })).body, 'id');
    const jobId = readString((await request('/api/jobs', { method: 'POST', body: pythonJob })).body, 'id');

    const analysis = await request('/api/analyze', { method: 'POST', body: { resumeId, jobId } });

    expect(analysis.status).toBe(201);
    expect(analysis.body).toMatchObject({
      resumeId,
      jobId,
      source: 'mock',
      relevanceScore: 0.9,
      jobMatchPercentage: 90,
      strengths: ['Skill match: 4/5', 'Work experience: 4 years'],
      analysisText: 'Candidate Ivan Petrov has 4 of 5 required skills and 4 years of work experience.'
    });

    const analysisId = readString(analysis.body, 'id');
    expect((await request(`/api/analyses/${analysisId}`)).body).toEqual(analysis.body);
    expect((await request(`/api/analyses?resumeId=${resumeId}`)).body).toEqual([analysis.body]);
    expect((await request('/api/analyses?jobId=other')).body).toEqual([]);
  });

  it('reports missing identifiers and unknown records on analyze', async () => {
    const jobId = readString((await request('/api/jobs', { method: 'POST', body: pythonJob })).body, 'id');

    expect(await request('/api/analyze', { method: 'POST', body: {} })).toEqual({
      status: 400,
      body: { code: 'missing-field', message: 'Both resumeId and jobId are required.' }
    });
    expect(await request('/api/analyze', { method: 'POST', body: { resumeId: 'unknown', jobId } })).toEqual({
      status: 404,
      body: { code: 'not-found', message: 'Résumé or job posting not found.' }
    });
  });

  it('imports an hh.ru résumé', async () => {
    const imported = await request('/api/import/hh', {
      method: 'POST',
      body: { first_name: 'Oleg', last_name: 'Sidorov', title: 'DevOps Engineer', key_skills: [{ name: 'Kubernetes' }] }
    });

    expect(imported.status).toBe(201);
    expect(imported.body).toMatchObject({ name: 'Oleg Sidorov', position: 'DevOps Engineer', skills: ['Kubernetes'] });
  });

  it('guards the admin overview by role', async () => {
    await request('/auth/register', { method: 'POST', body: { username: 'admin', password: 'test-password' } });
    const alice = await request('/auth/register', { method: 'POST', body: { username: 'alice', password: 'test-password' } });
    expect(alice).toEqual({ status: 201, body: { username: 'alice', role: 'user' } });

    expect((await request('/admin/overview')).status).toBe(401);

    const aliceToken = readString(
      (await request('/auth/login', { method: 'POST', body: { username: 'alice', password: 'test-password' } })).body,
      'token'
    );
    expect(await request('/admin/overview', { token: aliceToken })).toEqual({
      status: 403,
      body: { code: 'forbidden', message: 'Administrator role required.' }
    });

    const adminToken = readString(
      (await request('/auth/login', { method: 'POST', body: { username: 'admin', password: 'test-password' } })).body,
      'token'
    );
    const overview = await request('/admin/overview', { token: adminToken });
    expect(overview.status).toBe(200);
    expect(overview.body).toMatchObject({
      users: [
        { username: 'admin', role: 'admin' },
        { username: 'alice', role: 'user' }
      ]
    });
  });

  it('ends the session on logout', async () => {
    await request('/auth/register', { method: 'POST', body: { username: 'alice', password: 'test-password' } });
    const login = await request('/auth/login', { method: 'POST', body: { username: 'alice', password: 'wrong' } });
    expect(login).toEqual({ status: 401, body: { code: 'unauthorized', message: 'Invalid credentials.' } });

    const token = readString(
      (await request('/auth/login', { method: 'POST', body: { username: 'alice', password: 'test-password' } })).body,
      'token'
    );
    expect((await request('/auth/me', { token })).body).toMatchObject({ username: 'alice', role: 'user' });
    expect(await request('/auth/logout', { method: 'POST', token })).toEqual({ status: 200, body: { status: 'ok' } });
    expect((await request('/auth/me', { token })).status).toBe(401);
  });

  it('persists one log entry per request', async () => {
    await request('/api/resumes', { method: 'POST', body: ivan });

    await vi.waitFor(async () => {
      const logs = await context.requestLogs.listRecent(10);
      expect(logs).toContainEqual(
        expect.objectContaining({ method: 'POST', path: '/api/resumes', status: 201, user: null })
      );
    });
  });
});
