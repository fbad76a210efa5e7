/**
 * iDEAL Gateway Configuration
 */

import crypto, { KeyObject, X509Certificate } from 'crypto';
import fs from 'fs';
import { z } from 'zod';
import { config, IdealEnvironmentSettings } from '../../domain/config';
import { ConfigurationError, Environment } from '../types';
import { ACQUIRERS, AcquirerDefinition, AcquirerName, WhitespacePolicy, parseAcquirerName } from './acquirers';
import { ProtocolVersion, ProtocolVersionName, getProtocol } from './protocol';

/**
 * The merchant's registration at the acquirer
 */
export interface MerchantIdentity {
  /** Nine digits, left-padded with zeroes. */
  readonly merchantId: string;
  readonly subId: number;
  readonly privateKey: KeyObject;
  readonly certificate: X509Certificate;
  /** PEM sources, presented as the TLS client identity. */
  readonly privateKeyPem: string;
  readonly certificatePem: string;
  readonly passphrase?: string;
}

export interface IdealConfig {
  readonly merchant: MerchantIdentity;
  /** The acquirer's certificate, used to verify responses. */
  readonly bankCertificate: X509Certificate;
  readonly acquirerName: AcquirerName;
  readonly acquirer: AcquirerDefinition;
  readonly whitespacePolicy: WhitespacePolicy;
  readonly protocol: ProtocolVersion;
  readonly environment: Environment;
  readonly debug: boolean;
}

const MERCHANT_ID_LENGTH = 9;

const idealConfigInputSchema = z.object({
  merchantId: z.string().trim().regex(/^\d{1,9}$/, 'merchantId must consist of 1 to 9 digits'),
  subId: z
    .union([z.number(), z.string()])
    .default(0)
    .pipe(z.coerce.number().int().min(0, 'subId must be a non-negative integer')),
  passphrase: z.string().optional(),
  privateKey: z.string().min(1, 'privateKey must not be empty'),
  privateCertificate: z.string().min(1, 'privateCertificate must not be empty'),
  bankCertificate: z.string().min(1, 'bankCertificate must not be empty'),
  acquirer: z.string().default('ing'),
  environment: z.string().default('test').pipe(z.enum(['test', 'live'])),
  protocolVersion: z.string().default('3.3.1').pipe(z.enum(['1.1.0', '3.3.1'])),
  debug: z.boolean().default(false),
});

/**
 * Configuration with the key and certificates given as PEM text
 */
export type IdealConfigInput = z.input<typeof idealConfigInputSchema>;

function loadPrivateKey(pem: string, passphrase?: string): KeyObject {
  let key: KeyObject;
  try {
    key = crypto.createPrivateKey({ key: pem, format: 'pem', passphrase: passphrase || undefined });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Unable to load the merchant private key: ${message}`, error);
  }

  if (key.asymmetricKeyType !== 'rsa') {
    throw new ConfigurationError(
      `The merchant private key must be an RSA key, got ${key.asymmetricKeyType ?? 'unknown'}`
    );
  }

  return key;
}

function loadCertificate(label: string, pem: string): X509Certificate {
  try {
    return new X509Certificate(pem);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Unable to load the ${label} certificate: ${message}`, error);
  }
}

/**
 * Validate settings and load the key material they reference
 */
export function createIdealConfig(input: IdealConfigInput): IdealConfig {
  const validation = idealConfigInputSchema.safeParse(input);

  if (!validation.success) {
    throw new ConfigurationError(
      `Invalid iDEAL gateway configuration: ${validation.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ')}`
    );
  }

  const settings = validation.data;
  const protocolVersion: ProtocolVersionName = settings.protocolVersion;
  const acquirerName = parseAcquirerName(settings.acquirer);
  const acquirer = ACQUIRERS[protocolVersion][acquirerName];
  const privateKey = loadPrivateKey(settings.privateKey, settings.passphrase);
  const certificate = loadCertificate('merchant', settings.privateCertificate);
  const bankCertificate = loadCertificate('acquirer', settings.bankCertificate);

  const merchant: MerchantIdentity = Object.freeze({
    merchantId: settings.merchantId.padStart(MERCHANT_ID_LENGTH, '0'),
    subId: settings.subId,
    privateKey,
    certificate,
    privateKeyPem: settings.privateKey,
    certificatePem: settings.privateCertificate,
    passphrase: settings.passphrase || undefined,
  });

  return Object.freeze({
    merchant,
    bankCertificate,
    acquirerName,
    acquirer,
    whitespacePolicy: acquirer.whitespacePolicy,
    protocol: getProtocol(protocolVersion),
    environment: settings.environment,
    debug: settings.debug,
  });
}

function readPemFile(label: string, path: string): string {
  try {
    return fs.readFileSync(path, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Unable to read the ${label} file ${path}: ${message}`, error);
  }
}

/**
 * Load and validate iDEAL configuration from environment
 */
export function getIdealConfig(source: IdealEnvironmentSettings = config.ideal): IdealConfig {
  const missing: string[] = [];
  if (!source.merchantId) missing.push('IDEAL_MERCHANT_ID');
  if (!source.privateKeyPath) missing.push('IDEAL_PRIVATE_KEY_PATH');
  if (!source.privateCertificatePath) missing.push('IDEAL_PRIVATE_CERTIFICATE_PATH');
  if (!source.bankCertificatePath) missing.push('IDEAL_BANK_CERTIFICATE_PATH');

  if (!source.merchantId || !source.privateKeyPath || !source.privateCertificatePath || !source.bankCertificatePath) {
    throw new ConfigurationError(`iDEAL gateway configuration missing: ${missing.join(', ')}`);
  }

  return createIdealConfig({
    merchantId: source.merchantId,
    subId: source.subId,
    passphrase: source.passphrase,
    privateKey: readPemFile('private key', source.privateKeyPath),
    privateCertificate: readPemFile('private certificate', source.privateCertificatePath),
    bankCertificate: readPemFile('acquirer certificate', source.bankCertificatePath),
    acquirer: source.acquirer,
    environment: source.environment,
    protocolVersion: source.protocolVersion,
    debug: source.debug,
  });
}
