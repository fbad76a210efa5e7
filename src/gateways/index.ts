/**
 * Payment Gateway Module
 *
 * iDEAL merchant gateway: issuer directory, transaction setup and status.
 *
 * @example
 * ```typescript
 * import { getPaymentGateway } from './gateways';
 *
 * const gateway = getPaymentGateway();
 * const response = await gateway.setupPurchase(4321, {
 *   issuerId: '0001',
 *   expirationPeriod: 'PT10M',
 *   returnUrl: 'https://shop.example.com/return',
 *   orderId: '12345678',
 *   description: 'Order 12345678',
 *   entranceCode: 'session-1234',
 * });
 * ```
 */

// Core types and interfaces
export type {
  GatewayName,
  Environment,
  RequestKind,
  PaymentGateway,
  PurchaseOptions,
  IssuerDirectoryEntry,
  IssuerCountry,
  TransactionStatus,
  ErrorType,
  ValidationConstraint,
} from './types';

export { GatewayError, ConfigurationError, ValidationError, XmlParseError } from './types';

// Gateway factory
export {
  getPaymentGateway,
  validateGatewayConfig,
  resetGatewayInstances,
} from './gatewayFactory';

export * from './ideal';
