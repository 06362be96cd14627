import {
  CaptureContextRequest,
  NormalizedNotification,
  PaymentProvider,
  PaymentProviderAdapter,
  PaymentRecord,
  ProviderInitiateRequest,
  ProviderInitiateResult,
} from '../../src/types/payments';
import { SignatureInvalidError } from '../../src/utils/errorHandler';

export interface FakeAdapterState {
  initiateResult: ProviderInitiateResult | Error;
  /** Returned by parseNotification when the test signature header is valid. */
  notifications: NormalizedNotification[];
  /** `missing` answers as a provider with no record of the payment; null answers pending. */
  pollResult: NormalizedNotification | Error | 'missing' | null;
  initiated: ProviderInitiateRequest[];
  polled: PaymentRecord[];
  captureContexts: CaptureContextRequest[];
}

export const VALID_SIGNATURE = 'valid';

/** Provider adapter driven entirely by the test; `x-test-signature: valid` authenticates a notification. */
export function createFakeAdapter(
  provider: PaymentProvider,
  options: { pollable?: boolean; pollsWithoutReference?: boolean; capturesCards?: boolean; wholeAmountsOnly?: boolean } = {}
): { adapter: PaymentProviderAdapter; state: FakeAdapterState } {
  const state: FakeAdapterState = {
    initiateResult: {
      providerReference: `${provider}-ref`,
      instructions: { kind: 'push-prompt', customerMessage: 'Check your phone' },
      immediate: null,
    },
    notifications: [],
    pollResult: null,
    initiated: [],
    polled: [],
    captureContexts: [],
  };

  const adapter: PaymentProviderAdapter = {
    provider,
    wholeAmountsOnly: options.wholeAmountsOnly ?? false,
    pollsWithoutReference: options.pollsWithoutReference ?? false,

    async initiate(request) {
      state.initiated.push(request);
      if (state.initiateResult instanceof Error) throw state.initiateResult;
      return state.initiateResult;
    },

    async parseNotification(inbound) {
      if (inbound.headers['x-test-signature'] !== VALID_SIGNATURE) {
        throw new SignatureInvalidError(provider, 'signature_mismatch');
      }
      return state.notifications;
    },

    acknowledgement(_inbound, outcomes) {
      return { received: true, outcomes };
    },
  };

  if (options.pollable) {
    adapter.pollStatus = async (payment) => {
      state.polled.push(payment);
      if (state.pollResult instanceof Error) throw state.pollResult;
      if (state.pollResult === 'missing') return null;
      return (
        state.pollResult ?? {
          paymentId: payment.paymentId,
          providerReference: payment.providerReference,
          status: 'pending',
          amount: null,
          currency: null,
          failureReason: null,
          providerData: {},
        }
      );
    };
  }

  if (options.capturesCards) {
    adapter.createCaptureContext = async (request) => {
      state.captureContexts.push(request);
      const targetOrigins = request.targetOrigins.length > 0 ? request.targetOrigins : ['https://app.example.test'];
      return { captureContext: 'test-capture-context', targetOrigins };
    };
  }

  return { adapter, state };
}
