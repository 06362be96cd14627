import { PaymentProvider, PaymentProviderAdapter } from '../../types/payments';
import { ApiError } from '../../utils/errorHandler';

export type ProviderRegistry = Partial<Record<PaymentProvider, PaymentProviderAdapter>>;

export function buildProviderRegistry(adapters: PaymentProviderAdapter[]): ProviderRegistry {
  const registry: ProviderRegistry = {};
  for (const adapter of adapters) registry[adapter.provider] = adapter;
  return registry;
}

export function requireAdapter(registry: ProviderRegistry, provider: PaymentProvider): PaymentProviderAdapter {
  const adapter = registry[provider];
  if (!adapter) {
    throw new ApiError('Provider not configured', 503, { provider }, 'PROVIDER_UNAVAILABLE');
  }
  return adapter;
}
