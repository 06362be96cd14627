import axios from 'axios';
import { ZodError } from 'zod';
import { PaymentProvider } from '../../types/payments';
import { ApiError, ProviderRejectedError, ProviderTimeoutError } from '../../utils/errorHandler';

function describeResponse(data: unknown): string {
  if (typeof data === 'string') return data.slice(0, 200);
  if (data && typeof data === 'object') {
    const record: Record<string, unknown> = { ...data };
    for (const key of ['errorMessage', 'message', 'reason', 'error_description', 'ResponseDescription']) {
      const value = record[key];
      if (typeof value === 'string' && value) return value;
    }
  }
  return 'provider_error';
}

/**
 * Maps a provider HTTP failure onto the error taxonomy. No response means the
 * outcome is unknown, which is treated as a timeout so the record stays open.
 */
export function toProviderError(provider: PaymentProvider, operation: string, err: unknown): Error {
  if (err instanceof ProviderRejectedError || err instanceof ProviderTimeoutError) return err;
  if (axios.isAxiosError(err)) {
    if (err.response) {
      return new ProviderRejectedError(provider, describeResponse(err.response.data), {
        operation,
        status: err.response.status,
      });
    }
    return new ProviderTimeoutError(provider, operation);
  }
  // The call went through but the answer is unusable, so the outcome stays unknown.
  if (err instanceof ZodError) {
    return new ApiError(`${provider} returned an unexpected response`, 502, { provider, operation }, 'PROVIDER_UNAVAILABLE');
  }
  return err instanceof Error ? err : new Error(String(err));
}
