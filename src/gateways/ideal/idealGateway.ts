/**
 * iDEAL Gateway Implementation
 *
 * Implements the PaymentGateway interface for iDEAL acquirers. One class
 * serves both protocol versions; the configured ProtocolVersion decides how
 * requests are signed and responses verified.
 */

import { GatewayName, PaymentGateway, PurchaseOptions, RequestKind } from '../types';
import { HttpsTransport, SecureTransport } from './apiClient';
import { IdealConfig, getIdealConfig } from './config';
import { resolveEndpoint } from './acquirers';
import { ProtocolVersion } from './protocol';
import {
  SignedRequest,
  SigningContext,
  buildDirectoryRequest,
  buildStatusRequest,
  buildTransactionRequest,
} from './requestBuilder';
import {
  DirectoryResponse,
  IdealResponse,
  ResponseContext,
  StatusResponse,
  TransactionResponse,
} from './responses';

const CONTENT_TYPE = 'application/xml; charset=utf-8';

type ResponseClass<T extends IdealResponse> = new (raw: string, context: ResponseContext) => T;

export class IdealGateway implements PaymentGateway {
  private readonly signing: SigningContext;

  constructor(
    private readonly config: IdealConfig = getIdealConfig(),
    private readonly transport: SecureTransport = new HttpsTransport(),
    private readonly clock: () => Date = () => new Date()
  ) {
    this.signing = {
      protocol: config.protocol,
      merchant: config.merchant,
      whitespacePolicy: config.whitespacePolicy,
    };
  }

  getProviderName(): GatewayName {
    return 'ideal';
  }

  get protocol(): ProtocolVersion {
    return this.config.protocol;
  }

  get subId(): number {
    return this.config.merchant.subId;
  }

  /**
   * Whether requests go to the acquirer's test environment
   */
  get test(): boolean {
    return this.config.environment === 'test';
  }

  /**
   * The acquirer URL a request of the given kind is posted to
   */
  requestUrl(kind: RequestKind): string {
    return resolveEndpoint(this.config.acquirer, this.config.environment, kind);
  }

  async issuers(): Promise<DirectoryResponse> {
    return this.post(buildDirectoryRequest(this.signing, this.clock()), DirectoryResponse);
  }

  /**
   * Register a transaction. Redirect the consumer to `serviceUrl` of the
   * response and keep its `transactionId` for `capture()`.
   *
   * @example
   * ```typescript
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
  async setupPurchase(amount: number, options: Partial<PurchaseOptions>): Promise<TransactionResponse> {
    return this.post(buildTransactionRequest(amount, options, this.signing, this.clock()), TransactionResponse);
  }

  async capture(transactionId: string): Promise<StatusResponse> {
    return this.post(buildStatusRequest({ transactionId }, this.signing, this.clock()), StatusResponse);
  }

  private async post<T extends IdealResponse>(request: SignedRequest, responseClass: ResponseClass<T>): Promise<T> {
    const url = this.requestUrl(request.kind);
    const { merchant } = this.config;

    if (this.config.debug) {
      console.log(`[IdealGateway] POST ${url}`);
      console.log(`[IdealGateway] Request:\n${request.body}`);
    }

    const body = await this.transport.post(url, request.body, {
      headers: { 'Content-Type': CONTENT_TYPE },
      clientKey: merchant.privateKeyPem,
      clientCertificate: merchant.certificatePem,
      passphrase: merchant.passphrase,
    });

    if (this.config.debug) {
      console.log(`[IdealGateway] Response:\n${body}`);
    }

    return new responseClass(body, {
      protocol: this.config.protocol,
      bankCertificate: this.config.bankCertificate,
      test: this.test,
    });
  }
}
