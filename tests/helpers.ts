import { SecureError } from '../src/utils/error-handler.js';

export const rejectionOf = async (promise: Promise<unknown>): Promise<SecureError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SecureError) return error;
    throw error;
  }
  throw new Error('Expected promise to reject');
};

export const thrownBy = (fn: () => unknown): SecureError => {
  try {
    fn();
  } catch (error) {
    if (error instanceof SecureError) return error;
    throw error;
  }
  throw new Error('Expected function to throw');
};

export const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
