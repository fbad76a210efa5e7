/**
 * iDEAL Responses
 *
 * Each response wraps the raw body returned by the acquirer. Outcomes are
 * returned as data: an `ErrorRes` document, a non-success status or a
 * signature that does not verify all yield `success === false`.
 */

import { X509Certificate } from 'crypto';
import { ErrorType, IssuerCountry, IssuerDirectoryEntry, TransactionStatus, XmlParseError } from '../types';
import { ProtocolVersion } from './protocol';
import { verifyEnvelopedSignature, verifyLegacySignature } from './responseVerifier';
import { XmlRecord, elementsAt, parseXmlResponse, textAt } from './xmlUtils';

/**
 * What a response needs to interpret and verify its body
 */
export interface ResponseContext {
  protocol: ProtocolVersion;
  bankCertificate: X509Certificate;
  /** Whether the response came from a test endpoint. */
  test?: boolean;
}

const ERROR_TYPES: Readonly<Record<string, ErrorType>> = {
  IX: 'xml',
  SO: 'system',
  SE: 'security',
  BR: 'value',
  AP: 'application',
};

const TRANSACTION_STATUSES: readonly TransactionStatus[] = ['success', 'cancelled', 'expired', 'open', 'failure'];

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Base class for all iDEAL responses
 */
export abstract class IdealResponse {
  protected readonly root: XmlRecord;
  readonly rootName: string;
  private verification?: boolean;

  constructor(
    readonly raw: string,
    protected readonly context: ResponseContext
  ) {
    const parsed = parseXmlResponse(raw);
    this.root = parsed.root;
    this.rootName = parsed.rootName;
  }

  /**
   * Whether the response came from a test endpoint
   */
  get test(): boolean {
    return this.context.test ?? false;
  }

  get isError(): boolean {
    return this.rootName === 'ErrorRes';
  }

  get success(): boolean {
    return !this.isError;
  }

  /**
   * Whether the acquirer's signature over this response checks out.
   * Computed on first access.
   */
  get verified(): boolean {
    if (this.verification === undefined) {
      this.verification = this.verifySignature();
    }
    return this.verification;
  }

  get createdAt(): string | undefined {
    return this.text([this.context.protocol.tags.createdAt]);
  }

  /** Technical error message. */
  get errorMessage(): string | undefined {
    return this.errorText('errorMessage');
  }

  /** Error message meant for the consumer. */
  get consumerErrorMessage(): string | undefined {
    return this.errorText('consumerMessage');
  }

  get errorDetails(): string | undefined {
    return this.errorText('errorDetail');
  }

  get suggestedAction(): string | undefined {
    return this.errorText('suggestedAction');
  }

  /**
   * iDEAL error code, e.g. `SO1000` (failure in system) or `AP2915`
   * (amount too low)
   */
  get errorCode(): string | undefined {
    return this.errorText('errorCode');
  }

  /**
   * Category taken from the first two characters of the error code:
   * IX xml, SO system, SE security, BR value, AP application
   */
  get errorType(): ErrorType | undefined {
    const code = this.errorCode;
    return code === undefined ? undefined : ERROR_TYPES[code.slice(0, 2)];
  }

  protected text(path: readonly string[]): string | undefined {
    return nonEmpty(textAt(this.root, path));
  }

  private errorText(tag: string): string | undefined {
    return this.success ? undefined : this.text(['Error', tag]);
  }

  /**
   * 3.3.1 responses carry an enveloped signature. Legacy directory and
   * transaction responses are not signed.
   */
  protected verifySignature(): boolean {
    if (this.context.protocol.signatureMode === 'xmldsig') {
      return verifyEnvelopedSignature(this.raw, this.context.bankCertificate);
    }
    return false;
  }
}

/**
 * Returned by `issuers()`: the issuers available at the acquirer
 */
export class DirectoryResponse extends IdealResponse {
  /**
   * Time the acquirer last changed its directory. Merchants should not
   * request the directory more than once a day.
   */
  get directoryTimestamp(): string | undefined {
    return this.text(['Directory', 'directoryDateTimestamp']) ?? this.text(['Directory', 'directoryDateTimeStamp']);
  }

  /**
   * All issuers in document order
   *
   * @example
   * ```typescript
   * (await gateway.issuers()).list(); // [{ id: '0151', name: 'Issuer Simulator' }]
   * ```
   */
  list(): IssuerDirectoryEntry[] {
    const direct = elementsAt(this.root, ['Directory', 'Issuer']).map(toIssuerEntry);
    return [...direct, ...this.countries().flatMap((country) => country.issuers)];
  }

  /**
   * Issuers grouped per country. Legacy directories have no countries.
   */
  countries(): IssuerCountry[] {
    return elementsAt(this.root, ['Directory', 'Country']).map((country) => ({
      country: textAt(country, ['countryNames']) ?? '',
      issuers: elementsAt(country, ['Issuer']).map(toIssuerEntry),
    }));
  }
}

function toIssuerEntry(issuer: XmlRecord): IssuerDirectoryEntry {
  return {
    id: textAt(issuer, ['issuerID']) ?? '',
    name: textAt(issuer, ['issuerName']) ?? '',
  };
}

/**
 * Returned by `setupPurchase()`
 */
export class TransactionResponse extends IdealResponse {
  /**
   * The issuer page the consumer should be redirected to
   */
  get serviceUrl(): string | undefined {
    return this.text(['Issuer', 'issuerAuthenticationURL']);
  }

  /**
   * Needed to request the transaction status, see `capture()`
   */
  get transactionId(): string | undefined {
    return this.text(['Transaction', 'transactionID']);
  }

  get orderId(): string | undefined {
    return this.text(['Transaction', 'purchaseID']);
  }

  get purchaseId(): string | undefined {
    return this.orderId;
  }
}

/**
 * Returned by `capture()`
 *
 * `success` requires a `Success` status and a verified acquirer signature.
 * When the signature does not verify there is no error code; check
 * `verified` to tell the cases apart.
 */
export class StatusResponse extends IdealResponse {
  get success(): boolean {
    return !this.isError && this.status === 'success' && this.verified;
  }

  get status(): TransactionStatus | undefined {
    const status = this.text(['Transaction', 'status'])?.trim().toLowerCase();
    return TRANSACTION_STATUSES.find((candidate) => candidate === status);
  }

  get transactionId(): string | undefined {
    return this.text(['Transaction', 'transactionID']);
  }

  get statusDateTimestamp(): string | undefined {
    return this.text(['Transaction', 'statusDateTimestamp']);
  }

  /** Name on the consumer's bank account, when the payment succeeded. */
  get consumerName(): string | undefined {
    return this.text(['Transaction', 'consumerName']);
  }

  get consumerAccountNumber(): string | undefined {
    return this.text(['Transaction', 'consumerAccountNumber']);
  }

  get consumerCity(): string | undefined {
    return this.text(['Transaction', 'consumerCity']);
  }

  get consumerIBAN(): string | undefined {
    return this.text(['Transaction', 'consumerIBAN']);
  }

  get consumerBIC(): string | undefined {
    return this.text(['Transaction', 'consumerBIC']);
  }

  get amount(): string | undefined {
    return this.text(['Transaction', 'amount']);
  }

  get currency(): string | undefined {
    return this.text(['Transaction', 'currency']);
  }

  protected verifySignature(): boolean {
    if (this.context.protocol.signatureMode === 'xmldsig') {
      return super.verifySignature();
    }

    return verifyLegacySignature(
      {
        createdAt: this.createdAt,
        transactionId: this.transactionId,
        status: this.text(['Transaction', 'status']),
        consumerAccountNumber: this.consumerAccountNumber,
        signatureValue: this.text(['Signature', 'signatureValue']),
      },
      this.context.bankCertificate
    );
  }
}

/**
 * An `ErrorRes` document received where no specific response was expected
 */
export class ErrorResponse extends IdealResponse {}

export type AnyIdealResponse = DirectoryResponse | TransactionResponse | StatusResponse | ErrorResponse;

/**
 * Build the response matching the root element of the body
 */
export function parseIdealResponse(raw: string, context: ResponseContext): AnyIdealResponse {
  const { rootName } = parseXmlResponse(raw);

  switch (rootName) {
    case 'DirectoryRes':
      return new DirectoryResponse(raw, context);
    case 'AcquirerTrxRes':
      return new TransactionResponse(raw, context);
    case 'AcquirerStatusRes':
      return new StatusResponse(raw, context);
    case 'ErrorRes':
      return new ErrorResponse(raw, context);
    default:
      throw new XmlParseError(`Unexpected iDEAL response: ${rootName}`, raw);
  }
}
