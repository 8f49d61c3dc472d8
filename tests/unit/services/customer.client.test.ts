/**
 * Customer Service Client Unit Tests
 */

const mockGet = jest.fn();

jest.mock('axios', () => ({
  __esModule: true,
  default: {
    get: (...args: unknown[]) => mockGet(...args),
    isAxiosError: (error: unknown) => typeof error === 'object' && error !== null && 'isAxiosError' in error,
  },
}));

import { runWithContext } from '../../../src/observability/log-context';
import { HttpCustomerClient } from '../../../src/services/customer/customer.client';
import { ErrorCode } from '../../../src/types/errors';

const axiosFailure = (fields: { code?: string; message: string; status?: number }) => ({
  isAxiosError: true,
  code: fields.code,
  message: fields.message,
  response: fields.status !== undefined ? { status: fields.status } : undefined,
});

describe('HttpCustomerClient', () => {
  const client = new HttpCustomerClient({ baseUrl: 'http://customers.test', timeoutMs: 3000 });

  beforeEach(() => {
    mockGet.mockReset();
  });

  it('should call the validate endpoint with the timeout and correlation id', async () => {
    mockGet.mockResolvedValue({ status: 200, data: { name: 'Ada', state: true } });

    const result = await runWithContext({ correlationId: 'corr-1' }, () => client.lookup('cust-1'));

    expect(result).toEqual({ status: 'found', customerId: 'cust-1', name: 'Ada', active: true });
    expect(mockGet).toHaveBeenCalledWith(
      'http://customers.test/api/v1/customers/cust-1/validate',
      expect.objectContaining({
        timeout: 3000,
        headers: { Accept: 'application/json', 'x-correlation-id': 'corr-1' },
      })
    );
  });

  it('should encode the customer id in the path', async () => {
    mockGet.mockResolvedValue({ status: 200, data: {} });

    await client.lookup('a/b');

    expect(mockGet.mock.calls[0][0]).toBe('http://customers.test/api/v1/customers/a%2Fb/validate');
  });

  it('should treat a missing flag as active and read the active field', async () => {
    mockGet.mockResolvedValueOnce({ status: 200, data: {} });
    mockGet.mockResolvedValueOnce({ status: 200, data: { active: false } });

    await expect(client.lookup('cust-1')).resolves.toMatchObject({ status: 'found', active: true });
    await expect(client.lookup('cust-1')).resolves.toMatchObject({ status: 'found', active: false });
  });

  it('should read 400 as an inactive customer', async () => {
    mockGet.mockResolvedValue({ status: 400, data: { message: 'inactive' } });

    await expect(client.lookup('cust-1')).resolves.toEqual({ status: 'found', customerId: 'cust-1', active: false });
  });

  it('should read 404 as not found', async () => {
    mockGet.mockResolvedValue({ status: 404, data: null });

    await expect(client.lookup('cust-1')).resolves.toEqual({ status: 'not_found', customerId: 'cust-1' });
  });

  it('should fail closed on timeout', async () => {
    mockGet.mockRejectedValue(axiosFailure({ code: 'ECONNABORTED', message: 'timeout of 3000ms exceeded' }));

    await expect(client.lookup('cust-1')).rejects.toMatchObject({
      errorCode: ErrorCode.CUSTOMER_SERVICE_UNAVAILABLE,
      statusCode: 503,
      message: 'Customer validation failed: customer service timed out after 3000ms',
    });
  });

  it('should fail closed on unexpected statuses', async () => {
    mockGet.mockRejectedValue(axiosFailure({ message: 'Request failed with status code 500', status: 500 }));

    await expect(client.lookup('cust-1')).rejects.toMatchObject({
      message: 'Customer validation failed: customer service responded 500',
    });
  });

  it('should fail closed when the service is unreachable', async () => {
    mockGet.mockRejectedValue(axiosFailure({ message: 'connect ECONNREFUSED 127.0.0.1:8080' }));

    await expect(client.lookup('cust-1')).rejects.toMatchObject({
      message: 'Customer validation failed: connect ECONNREFUSED 127.0.0.1:8080',
    });
  });

  it('should fail closed on a malformed body', async () => {
    mockGet.mockResolvedValue({ status: 200, data: 'oops' });

    await expect(client.lookup('cust-1')).rejects.toMatchObject({
      message: 'Customer validation failed: malformed customer payload',
    });
  });
});
