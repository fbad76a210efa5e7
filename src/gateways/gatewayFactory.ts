/**
 * Gateway Factory
 *
 * Creates the iDEAL gateway from environment configuration. The instance is
 * cached; call resetGatewayInstances() after changing the environment.
 */

import { PaymentGateway } from './types';
import { IdealGateway, getIdealConfig } from './ideal';
import { IdealEnvironmentSettings } from '../domain/config';

// Singleton instance
let idealInstance: IdealGateway | null = null;

/**
 * Get the payment gateway configured by the IDEAL_* environment variables,
 * or by `settings` when given. Settings only apply to the first call until
 * the instance is reset.
 *
 * @example
 * ```typescript
 * const gateway = getPaymentGateway();
 * const directory = await gateway.issuers();
 * directory.list(); // [{ id: '0001', name: 'Issuer Simulator' }]
 * ```
 */
export function getPaymentGateway(settings?: IdealEnvironmentSettings): PaymentGateway {
  if (!idealInstance) {
    idealInstance = new IdealGateway(getIdealConfig(settings));
  }
  return idealInstance;
}

/**
 * Validate that the gateway has all required environment variables
 */
export function validateGatewayConfig(): void {
  console.log('[Gateway] Validating iDEAL configuration');

  // Creating the instance throws if config is invalid
  const gateway = getPaymentGateway();

  console.log(`[Gateway] Configuration valid. Active gateway: ${gateway.getProviderName()}`);
}

/**
 * Reset gateway instances (useful for testing)
 */
export function resetGatewayInstances(): void {
  idealInstance = null;
}
