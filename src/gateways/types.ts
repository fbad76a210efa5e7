/**
 * Payment Gateway Abstraction Layer
 *
 * Interfaces, shared types and errors for the iDEAL merchant gateway.
 */

import type {
  DirectoryResponse,
  StatusResponse,
  TransactionResponse,
} from './ideal/responses';

// Gateway identifiers
export type GatewayName = 'ideal';

/**
 * Environment in which a gateway talks to its acquirer
 */
export type Environment = 'test' | 'live';

/**
 * The three iDEAL request messages
 */
export type RequestKind = 'directory' | 'transaction' | 'status';

/**
 * Options for starting a purchase
 */
export interface PurchaseOptions {
  /** The id of an issuer returned by the directory request. */
  issuerId: string;
  /** ISO 8601 period during which the consumer may approve, e.g. `PT10M`. */
  expirationPeriod: string;
  /** Merchant URL the consumer returns to after paying. */
  returnUrl: string;
  /** Merchant order number, at most 12 characters. */
  orderId: string;
  /** At most 32 characters. */
  description: string;
  /** Arbitrary token echoed back on the return URL, at most 40 characters. */
  entranceCode: string;
}

/**
 * An issuing bank as listed by the acquirer directory
 */
export interface IssuerDirectoryEntry {
  id: string;
  name: string;
}

/**
 * Issuers grouped per country (protocol 3.3.1 directories)
 */
export interface IssuerCountry {
  country: string;
  issuers: IssuerDirectoryEntry[];
}

/**
 * Normalized transaction status
 */
export type TransactionStatus =
  | 'success'
  | 'cancelled'
  | 'expired'
  | 'open'
  | 'failure';

/**
 * Category taken from the first two characters of an iDEAL error code
 */
export type ErrorType = 'xml' | 'system' | 'security' | 'value' | 'application';

/**
 * Main Payment Gateway Interface
 */
export interface PaymentGateway {
  /**
   * Fetch the list of issuers available at the acquirer
   */
  issuers(): Promise<DirectoryResponse>;

  /**
   * Register a transaction at the acquirer
   * @param amount Amount in euro cents
   * @param options Purchase details
   * @returns Response carrying the issuer authentication URL and transaction id
   */
  setupPurchase(amount: number, options: Partial<PurchaseOptions>): Promise<TransactionResponse>;

  /**
   * Request the status of a previously registered transaction
   * @param transactionId Transaction id returned by setupPurchase
   */
  capture(transactionId: string): Promise<StatusResponse>;

  /**
   * Get the gateway provider name
   */
  getProviderName(): GatewayName;
}

/**
 * Error thrown when gateway operation fails
 */
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly gateway: GatewayName,
    public readonly code?: string,
    public readonly rawResponse?: unknown
  ) {
    super(message);
    this.name = 'GatewayError';
  }
}

/**
 * Error thrown when keys, certificates or settings are missing or unusable
 */
export class ConfigurationError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ideal', 'INVALID_CONFIG', cause);
    this.name = 'ConfigurationError';
  }
}

export type ValidationConstraint = 'required' | 'maxLength' | 'diacritics' | 'format';

/**
 * Error thrown when request fields are rejected before anything is signed
 */
export class ValidationError extends GatewayError {
  constructor(
    message: string,
    public readonly fields: readonly string[],
    public readonly constraint: ValidationConstraint
  ) {
    super(message, 'ideal', 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown for XML that is not well-formed
 */
export class XmlParseError extends GatewayError {
  constructor(message: string, rawResponse?: unknown) {
    super(message, 'ideal', 'XML_PARSE_ERROR', rawResponse);
    this.name = 'XmlParseError';
  }
}
