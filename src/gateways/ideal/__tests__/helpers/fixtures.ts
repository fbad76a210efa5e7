/**
 * Shared test fixtures: throwaway RSA identities, canned acquirer responses
 * and an in-process transport.
 */

import 'reflect-metadata';
import * as x509 from '@peculiar/x509';
import { KeyObject, X509Certificate, createPrivateKey } from 'crypto';
import { PurchaseOptions } from '../../../types';
import { PostOptions, SecureTransport } from '../../apiClient';
import { IdealConfig, IdealConfigInput, createIdealConfig } from '../../config';
import { appendEnvelopedSignature } from '../../signer';
import { parseXmlDocument, serializeXmlDocument } from '../../xmlUtils';

x509.cryptoProvider.set(crypto);

export interface TestIdentity {
  privateKey: KeyObject;
  privateKeyPem: string;
  certificate: X509Certificate;
  certificatePem: string;
}

const RSA_ALGORITHM = {
  name: 'RSASSA-PKCS1-v1_5',
  hash: 'SHA-256',
  publicExponent: new Uint8Array([1, 0, 1]),
  modulusLength: 2048,
};

/**
 * Generate an RSA key pair with a self-signed certificate. The PEM key is
 * encrypted when a passphrase is given.
 */
export async function createTestIdentity(
  commonName: string,
  passphrase?: string,
  extensions: x509.Extension[] = []
): Promise<TestIdentity> {
  const keys = await crypto.subtle.generateKey(RSA_ALGORITHM, true, ['sign', 'verify']);
  const certificate = await x509.X509CertificateGenerator.createSelfSigned({
    serialNumber: '01',
    name: `CN=${commonName}`,
    notBefore: new Date('2024-01-01T00:00:00Z'),
    notAfter: new Date('2034-01-01T00:00:00Z'),
    signingAlgorithm: RSA_ALGORITHM,
    keys,
    extensions,
  });

  const pkcs8 = await crypto.subtle.exportKey('pkcs8', keys.privateKey);
  const privateKey = createPrivateKey({ key: Buffer.from(pkcs8), format: 'der', type: 'pkcs8' });
  const privateKeyPem = passphrase
    ? privateKey.export({ type: 'pkcs8', format: 'pem', cipher: 'aes-256-cbc', passphrase }).toString()
    : privateKey.export({ type: 'pkcs8', format: 'pem' }).toString();
  const certificatePem = certificate.toString('pem');

  return {
    privateKey,
    privateKeyPem,
    certificate: new X509Certificate(certificatePem),
    certificatePem,
  };
}

/**
 * Identity for an in-process TLS server reachable at 127.0.0.1
 */
export function createServerIdentity(): Promise<TestIdentity> {
  return createTestIdentity('localhost', undefined, [
    new x509.BasicConstraintsExtension(true),
    new x509.SubjectAlternativeNameExtension([
      { type: 'dns', value: 'localhost' },
      { type: 'ip', value: '127.0.0.1' },
    ]),
  ]);
}

export const VALID_PURCHASE_OPTIONS: PurchaseOptions = {
  issuerId: '0001',
  expirationPeriod: 'PT10M',
  returnUrl: 'http://return_to.example.com',
  orderId: '12345678901',
  description: 'A classic Dutch windmill',
  entranceCode: '1234',
};

export const FIXED_NOW = new Date('2024-01-15T10:30:45.123Z');
export const FIXED_TIMESTAMP = '2024-01-15T10:30:45.000Z';

export function buildTestConfig(
  merchant: TestIdentity,
  bank: TestIdentity,
  overrides: Partial<IdealConfigInput> = {}
): IdealConfig {
  return createIdealConfig({
    merchantId: '123456789',
    subId: 0,
    privateKey: merchant.privateKeyPem,
    privateCertificate: merchant.certificatePem,
    bankCertificate: bank.certificatePem,
    acquirer: 'ing',
    environment: 'test',
    protocolVersion: '3.3.1',
    ...overrides,
  });
}

/**
 * Sign a response document the way an acquirer does
 */
export function signDocument(xml: string, key: KeyObject): string {
  const document = parseXmlDocument(xml);
  appendEnvelopedSignature(document, key, 'ACQUIRER-KEY');
  return serializeXmlDocument(document);
}

const NS_331 = 'http://www.idealdesk.com/ideal/messages/mer-acq/3.3.1';
const NS_110 = 'http://www.idealdesk.com/Message';

export const TRANSACTION_RESPONSE = `<?xml version="1.0" encoding="UTF-8"?>
<AcquirerTrxRes xmlns="${NS_331}" version="3.3.1">
  <createDateTimestamp>2024-01-15T10:30:46.000Z</createDateTimestamp>
  <Acquirer>
    <acquirerID>0050</acquirerID>
  </Acquirer>
  <Issuer>
    <issuerAuthenticationURL>https://ideal.example.com/long_service_url?X009=BETAAL&amp;X010=20</issuerAuthenticationURL>
  </Issuer>
  <Transaction>
    <transactionID>0001023456789112</transactionID>
    <transactionCreateDateTimestamp>2024-01-15T10:30:46.000Z</transactionCreateDateTimestamp>
    <purchaseID>iDEAL-aankoop 21</purchaseID>
  </Transaction>
</AcquirerTrxRes>
`;

export function statusResponse(status: string, consumerName = 'J. Jansen'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<AcquirerStatusRes xmlns="${NS_331}" version="3.3.1">
  <createDateTimestamp>2024-01-15T10:31:00.000Z</createDateTimestamp>
  <Acquirer>
    <acquirerID>0050</acquirerID>
  </Acquirer>
  <Transaction>
    <transactionID>0001023456789112</transactionID>
    <status>${status}</status>
    <statusDateTimestamp>2024-01-15T10:30:59.000Z</statusDateTimestamp>
    <consumerName>${consumerName}</consumerName>
    <consumerIBAN>NL00TEST0123456789</consumerIBAN>
    <consumerBIC>TESTNL2A</consumerBIC>
    <amount>43.21</amount>
    <currency>EUR</currency>
  </Transaction>
</AcquirerStatusRes>
`;
}

export const DIRECTORY_RESPONSE = `<?xml version="1.0" encoding="UTF-8"?>
<DirectoryRes xmlns="${NS_331}" version="3.3.1">
  <createDateTimestamp>2024-01-15T10:30:46.000Z</createDateTimestamp>
  <Acquirer>
    <acquirerID>0050</acquirerID>
  </Acquirer>
  <Directory>
    <directoryDateTimestamp>2024-01-01T00:00:00.000Z</directoryDateTimestamp>
    <Country>
      <countryNames>Nederland</countryNames>
      <Issuer>
        <issuerID>TESTNL2A</issuerID>
        <issuerName>Test Issuer One</issuerName>
      </Issuer>
      <Issuer>
        <issuerID>TESTNL2B</issuerID>
        <issuerName>Test Issuer Two</issuerName>
      </Issuer>
    </Country>
    <Country>
      <countryNames>Deutschland</countryNames>
      <Issuer>
        <issuerID>TESTDE2A</issuerID>
        <issuerName>Test Issuer Three</issuerName>
      </Issuer>
    </Country>
  </Directory>
</DirectoryRes>
`;

export const LEGACY_DIRECTORY_RESPONSE = `<?xml version="1.0" encoding="UTF-8"?>
<DirectoryRes xmlns="${NS_110}" version="1.1.0">
  <createDateTimeStamp>2024-01-15T10:30:46.000Z</createDateTimeStamp>
  <Acquirer>
    <acquirerID>0050</acquirerID>
  </Acquirer>
  <Directory>
    <directoryDateTimeStamp>2024-01-01T00:00:00.000Z</directoryDateTimeStamp>
    <Issuer>
      <issuerID>0151</issuerID>
      <issuerName>Issuer Simulator</issuerName>
      <issuerList>Short</issuerList>
    </Issuer>
  </Directory>
</DirectoryRes>
`;

export const LEGACY_STATUS_MESSAGE = '2024-01-15T10:31:00.000Z0001023456789112Success123456789';

export function legacyStatusResponse(signatureValue: string, consumerAccountNumber = '123456789'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<AcquirerStatusRes xmlns="${NS_110}" version="1.1.0">
  <createDateTimeStamp>2024-01-15T10:31:00.000Z</createDateTimeStamp>
  <Acquirer>
    <acquirerID>0050</acquirerID>
  </Acquirer>
  <Transaction>
    <transactionID>0001023456789112</transactionID>
    <status>Success</status>
    <consumerName>J. Jansen</consumerName>
    <consumerAccountNumber>${consumerAccountNumber}</consumerAccountNumber>
    <consumerCity>Utrecht</consumerCity>
  </Transaction>
  <Signature>
    <signatureValue>${signatureValue}</signatureValue>
    <fingerprint>ACQUIRER-KEY</fingerprint>
  </Signature>
</AcquirerStatusRes>
`;
}

export function errorResponse(errorCode: string): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<ErrorRes xmlns="${NS_331}" version="3.3.1">
  <createDateTimestamp>2024-01-15T10:30:46.000Z</createDateTimestamp>
  <Error>
    <errorCode>${errorCode}</errorCode>
    <errorMessage>Failure in system</errorMessage>
    <errorDetail>System generating error: issuer</errorDetail>
    <suggestedAction>Please try again later</suggestedAction>
    <consumerMessage>Paying with iDEAL is not possible at the moment.</consumerMessage>
  </Error>
</ErrorRes>
`;
}

export interface RecordedPost {
  url: string;
  body: string;
  options: PostOptions;
}

/**
 * Records posted requests and answers from a handler instead of the network
 */
export class FakeTransport implements SecureTransport {
  readonly calls: RecordedPost[] = [];

  constructor(private readonly respond: (url: string, body: string) => string | Promise<string>) {}

  async post(url: string, body: string, options: PostOptions): Promise<string> {
    this.calls.push({ url, body, options });
    return this.respond(url, body);
  }
}
