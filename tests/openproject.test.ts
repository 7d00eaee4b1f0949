import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Readable } from 'stream';
import { AxiosError, AxiosHeaders } from 'axios';
import { OpenProjectIntegration, toWorkPackageBody, userFilter } from '../src/openproject';
import { toTransientError } from '../src/http';

const http = vi.hoisted(() => ({ get: vi.fn(), request: vi.fn() }));

vi.mock('../src/http', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/http')>();
  return { ...actual, createHttpClient: () => http };
});

vi.mock('../src/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

const CREDENTIALS = { baseUrl: 'https://openproject.test', username: 'apikey', password: 'test-secret' };
const USER = { id: 'u7', login: 'jdoe', email: 'jdoe@example.test', firstName: 'Jane', lastName: null };

describe('toWorkPackageBody', () => {
  it('should express references as HAL links and keep custom field keys', () => {
    const body = toWorkPackageBody({
      projectId: '7',
      subject: 'Prepare report',
      description: 'Quarterly numbers',
      statusId: '1',
      typeId: '2',
      parentId: '300',
      responsibleId: '5',
      assigneeId: '6',
      dueDate: '2024-05-10',
      customFields: { customField3: 'high' },
    });

    expect(body).toEqual({
      subject: 'Prepare report',
      description: { format: 'markdown', raw: 'Quarterly numbers' },
      dueDate: '2024-05-10',
      customField3: 'high',
      _links: {
        project: { href: '/api/v3/projects/7' },
        status: { href: '/api/v3/statuses/1' },
        type: { href: '/api/v3/types/2' },
        parent: { href: '/api/v3/work_packages/300' },
        assignee: { href: '/api/v3/users/6' },
        responsible: { href: '/api/v3/users/5' },
      },
    });
  });
});

describe('userFilter', () => {
  it('should build an equality filter', () => {
    expect(userFilter('login', 'jdoe')).toBe('[{"login":{"operator":"=","values":["jdoe"]}}]');
  });
});

describe('toTransientError', () => {
  it('should carry the HTTP status and response body', () => {
    const error = new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, {
      status: 422,
      statusText: 'Unprocessable Entity',
      data: { message: 'Subject can\'t be blank.' },
      headers: {},
      config: { headers: new AxiosHeaders() },
    });

    const wrapped = toTransientError(error, 'openproject', 'POST /api/v3/work_packages');

    expect(wrapped.status).toBe(422);
    expect(wrapped.service).toBe('openproject');
    expect(wrapped.message).toBe(
      'openproject 422 on POST /api/v3/work_packages: {"message":"Subject can\'t be blank."}'
    );
  });
});

describe('OpenProjectIntegration', () => {
  beforeEach(() => {
    http.request.mockReset();
  });

  it('should return the id of a created work package', async () => {
    http.request.mockResolvedValue({ data: { id: 301, _type: 'WorkPackage' } });
    const openproject = new OpenProjectIntegration(CREDENTIALS, { defaultUserId: null, allowUserCreation: false });

    const id = await openproject.createTask({ projectId: '7', subject: 'S', description: '' });

    expect(id).toBe('301');
    expect(http.request).toHaveBeenCalledWith(
      expect.objectContaining({ method: 'post', url: '/api/v3/work_packages' })
    );
  });

  it('should send the current lock version with an update', async () => {
    http.request
      .mockResolvedValueOnce({ data: { id: 5, lockVersion: 3 } })
      .mockResolvedValueOnce({ data: { id: 5 } });
    const openproject = new OpenProjectIntegration(CREDENTIALS, { defaultUserId: null, allowUserCreation: false });

    await openproject.updateTask('5', { projectId: '7', subject: 'S', description: 'd' });

    expect(http.request.mock.calls[1][0]).toMatchObject({
      method: 'patch',
      url: '/api/v3/work_packages/5',
      data: { subject: 'S', lockVersion: 3 },
    });
  });

  it('should upload attachments as multipart form data', async () => {
    http.request.mockResolvedValue({ data: { id: 77 } });
    const openproject = new OpenProjectIntegration(CREDENTIALS, { defaultUserId: null, allowUserCreation: false });

    const id = await openproject.createAttachment('5', Readable.from([Buffer.from('hello')]), 'hello.txt');

    expect(id).toBe('77');
    const form = http.request.mock.calls[0][0].data;
    expect(form).toBeInstanceOf(FormData);
    expect(form.get('metadata')).toBe('{"fileName":"hello.txt"}');
  });

  it('should report a broken download before uploading anything', async () => {
    const broken = new Readable({
      read() {
        this.destroy(new Error('connection reset'));
      },
    });
    const openproject = new OpenProjectIntegration(CREDENTIALS, { defaultUserId: null, allowUserCreation: false });

    await expect(openproject.createAttachment('5', broken, 'x.txt')).rejects.toThrow(
      'megaplan request download of x.txt failed: connection reset'
    );
    expect(http.request).not.toHaveBeenCalled();
  });

  describe('ensureUser', () => {
    it('should find a user by email when the login does not match', async () => {
      http.request
        .mockResolvedValueOnce({ data: { _embedded: { elements: [] } } })
        .mockResolvedValueOnce({ data: { _embedded: { elements: [{ id: 17, name: 'Jane Doe' }] } } });
      const openproject = new OpenProjectIntegration(CREDENTIALS, { defaultUserId: '1', allowUserCreation: false });

      expect(await openproject.ensureUser(USER)).toBe('17');
      expect(http.request.mock.calls[1][0].params).toEqual({ filters: userFilter('email', 'jdoe@example.test') });
    });

    it('should create a missing user when allowed', async () => {
      http.request
        .mockResolvedValueOnce({ data: { _embedded: { elements: [] } } })
        .mockResolvedValueOnce({ data: { _embedded: { elements: [] } } })
        .mockResolvedValueOnce({ data: { id: 21 } });
      const openproject = new OpenProjectIntegration(CREDENTIALS, { defaultUserId: '1', allowUserCreation: true });

      expect(await openproject.ensureUser(USER)).toBe('21');
      expect(http.request.mock.calls[2][0].data).toEqual({
        login: 'jdoe',
        email: 'jdoe@example.test',
        firstName: 'Jane',
        lastName: 'jdoe',
        status: 'active',
      });
    });

    it('should fall back to the default user otherwise', async () => {
      http.request.mockResolvedValue({ data: { _embedded: { elements: [] } } });
      const openproject = new OpenProjectIntegration(CREDENTIALS, { defaultUserId: '1', allowUserCreation: false });

      expect(await openproject.ensureUser(USER)).toBe('1');
    });
  });

  it('should page through projects until a short page', async () => {
    http.request
      .mockResolvedValueOnce({ data: { _embedded: { elements: [{ id: 1, name: 'A' }, { id: 2, name: 'B' }] } } })
      .mockResolvedValueOnce({ data: { _embedded: { elements: [{ id: 3, name: 'C' }] } } });
    const openproject = new OpenProjectIntegration(CREDENTIALS, {
      defaultUserId: null,
      allowUserCreation: false,
      pageSize: 2,
    });

    expect(await openproject.listProjects()).toEqual([
      { id: '1', name: 'A' },
      { id: '2', name: 'B' },
      { id: '3', name: 'C' },
    ]);
    expect(http.request.mock.calls.map(call => call[0].params.offset)).toEqual(['1', '2']);
  });
});
