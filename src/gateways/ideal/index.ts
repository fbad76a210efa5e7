/**
 * iDEAL Gateway Module
 */

export { IdealGateway } from './idealGateway';
export { getIdealConfig, createIdealConfig } from './config';
export type { IdealConfig, IdealConfigInput, MerchantIdentity } from './config';
export { HttpsTransport } from './apiClient';
export type { HttpsTransportOptions, SecureTransport, PostOptions } from './apiClient';
export { ACQUIRERS, ACQUIRER_NAMES, resolveAcquirer, resolveEndpoint } from './acquirers';
export type { AcquirerName, AcquirerDefinition, WhitespacePolicy } from './acquirers';
export { PROTOCOLS, getProtocol, isProtocolVersionName } from './protocol';
export type { ProtocolVersion, ProtocolVersionName, SignatureMode } from './protocol';
export { canonicalize } from './canonicalizer';
export type { CanonicalizeOptions } from './canonicalizer';
export { token, tokenCode, fingerprint, digestValue, signatureValue, stripWhitespace } from './signer';
export {
  buildDirectoryRequest,
  buildTransactionRequest,
  buildStatusRequest,
  signRequest,
} from './requestBuilder';
export type { RequestFields, SignedRequest, SigningContext } from './requestBuilder';
export {
  IdealResponse,
  DirectoryResponse,
  TransactionResponse,
  StatusResponse,
  ErrorResponse,
  parseIdealResponse,
} from './responses';
export type { AnyIdealResponse, ResponseContext } from './responses';
export { verifyEnvelopedSignature, verifyLegacySignature } from './responseVerifier';
export { parseXmlDocument } from './xmlUtils';
