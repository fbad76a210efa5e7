import { describe, it, expect, beforeAll, afterEach, vi } from 'vitest';
import { IdealGateway } from '../idealGateway';
import { TransactionResponse } from '../responses';
import { parseXmlResponse, textAt } from '../xmlUtils';
import { GatewayError, ValidationError } from '../../types';
import {
  DIRECTORY_RESPONSE,
  FIXED_NOW,
  FIXED_TIMESTAMP,
  FakeTransport,
  TRANSACTION_RESPONSE,
  TestIdentity,
  VALID_PURCHASE_OPTIONS,
  buildTestConfig,
  createTestIdentity,
  signDocument,
  statusResponse,
} from './helpers/fixtures';

describe('IdealGateway', () => {
  let merchant: TestIdentity;
  let bank: TestIdentity;

  beforeAll(async () => {
    merchant = await createTestIdentity('Test Merchant');
    bank = await createTestIdentity('Test Acquirer');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function createGateway(
    respond: (url: string, body: string) => string | Promise<string>,
    overrides: Parameters<typeof buildTestConfig>[2] = {}
  ): { gateway: IdealGateway; transport: FakeTransport } {
    const transport = new FakeTransport(respond);
    const gateway = new IdealGateway(buildTestConfig(merchant, bank, overrides), transport, () => FIXED_NOW);
    return { gateway, transport };
  }

  it('should describe itself', () => {
    const { gateway } = createGateway(() => '');

    expect(gateway.getProviderName()).toBe('ideal');
    expect(gateway.subId).toBe(0);
    expect(gateway.test).toBe(true);
    expect(gateway.protocol.version).toBe('3.3.1');
  });

  describe('setupPurchase', () => {
    it('should post a signed transaction request and return the response', async () => {
      const { gateway, transport } = createGateway(() => signDocument(TRANSACTION_RESPONSE, bank.privateKey));

      const response = await gateway.setupPurchase(4321, VALID_PURCHASE_OPTIONS);

      expect(response).toBeInstanceOf(TransactionResponse);
      expect(response.success).toBe(true);
      expect(response.verified).toBe(true);
      expect(response.test).toBe(true);
      expect(response.serviceUrl).toBe('https://ideal.example.com/long_service_url?X009=BETAAL&X010=20');
      expect(response.transactionId).toBe('0001023456789112');
      expect(response.orderId).toBe('iDEAL-aankoop 21');

      expect(transport.calls).toHaveLength(1);
      const [call] = transport.calls;
      expect(call?.url).toBe('https://idealtest.secure-ing.com/ideal/iDeal');
      expect(call?.options.headers).toEqual({ 'Content-Type': 'application/xml; charset=utf-8' });
      expect(call?.options.clientKey).toBe(merchant.privateKeyPem);
      expect(call?.options.clientCertificate).toBe(merchant.certificatePem);

      const { rootName, root } = parseXmlResponse(call?.body ?? '');
      expect(rootName).toBe('AcquirerTrxReq');
      expect(textAt(root, ['createDateTimestamp'])).toBe(FIXED_TIMESTAMP);
      expect(textAt(root, ['Transaction', 'amount'])).toBe('43.21');
    });

    it('should validate before anything is sent', async () => {
      const { gateway, transport } = createGateway(() => '');

      await expect(gateway.setupPurchase(4321, { ...VALID_PURCHASE_OPTIONS, orderId: '' })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(transport.calls).toHaveLength(0);
    });

    it('should return acquirer errors as data', async () => {
      const { gateway } = createGateway(
        () => `<?xml version="1.0" encoding="UTF-8"?>
<ErrorRes xmlns="http://www.idealdesk.com/ideal/messages/mer-acq/3.3.1" version="3.3.1">
  <createDateTimestamp>2024-01-15T10:30:46.000Z</createDateTimestamp>
  <Error>
    <errorCode>BR1210</errorCode>
    <errorMessage>Field generating error: amount</errorMessage>
  </Error>
</ErrorRes>`
      );

      const response = await gateway.setupPurchase(4321, VALID_PURCHASE_OPTIONS);

      expect(response.success).toBe(false);
      expect(response.errorCode).toBe('BR1210');
      expect(response.errorType).toBe('value');
      expect(response.serviceUrl).toBeUndefined();
    });
  });

  describe('issuers', () => {
    it('should post a directory request', async () => {
      const { gateway, transport } = createGateway(() => DIRECTORY_RESPONSE);

      const response = await gateway.issuers();

      expect(response.list().map((issuer) => issuer.id)).toEqual(['TESTNL2A', 'TESTNL2B', 'TESTDE2A']);
      expect(parseXmlResponse(transport.calls[0]?.body ?? '').rootName).toBe('DirectoryReq');
    });
  });

  describe('capture', () => {
    it('should request the status of a transaction', async () => {
      const { gateway, transport } = createGateway(() => signDocument(statusResponse('Success'), bank.privateKey));

      const response = await gateway.capture('0001023456789112');

      expect(response.success).toBe(true);
      expect(response.status).toBe('success');

      const { rootName, root } = parseXmlResponse(transport.calls[0]?.body ?? '');
      expect(rootName).toBe('AcquirerStatusReq');
      expect(textAt(root, ['Transaction', 'transactionID'])).toBe('0001023456789112');
    });

    it('should not succeed when the acquirer signature does not verify', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { gateway } = createGateway(() => statusResponse('Success'));

      const response = await gateway.capture('0001023456789112');

      expect(response.success).toBe(false);
      expect(response.errorCode).toBeUndefined();
    });
  });

  describe('endpoints', () => {
    it('should post to the live endpoint and tag responses as live', async () => {
      const { gateway, transport } = createGateway(() => signDocument(TRANSACTION_RESPONSE, bank.privateKey), {
        environment: 'live',
      });

      const response = await gateway.setupPurchase(4321, VALID_PURCHASE_OPTIONS);

      expect(transport.calls[0]?.url).toBe('https://ideal.secure-ing.com/ideal/iDeal');
      expect(response.test).toBe(false);
    });

    it('should resolve a URL per request kind for legacy ABN AMRO', () => {
      const { gateway } = createGateway(() => '', { acquirer: 'abnamro', protocolVersion: '1.1.0' });

      expect(gateway.requestUrl('directory')).toBe('https://itt.idealdesk.com/ITTEmulatorAcquirer/Directory.aspx');
      expect(gateway.requestUrl('transaction')).toBe('https://itt.idealdesk.com/ITTEmulatorAcquirer/Transaction.aspx');
      expect(gateway.requestUrl('status')).toBe('https://itt.idealdesk.com/ITTEmulatorAcquirer/Status.aspx');
    });
  });

  describe('transport failures', () => {
    it('should propagate gateway errors unchanged', async () => {
      const failure = new GatewayError('iDEAL API HTTP error: 500 Internal Server Error', 'ideal', 'HTTP_ERROR');
      const { gateway } = createGateway(() => {
        throw failure;
      });

      await expect(gateway.issuers()).rejects.toBe(failure);
    });

    it('should propagate other transport errors unchanged', async () => {
      const failure = new Error('socket hang up');
      const { gateway } = createGateway(() => {
        throw failure;
      });

      await expect(gateway.capture('0001023456789112')).rejects.toBe(failure);
    });
  });

  describe('debug logging', () => {
    it('should log requests and responses', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const { gateway } = createGateway(() => DIRECTORY_RESPONSE, { debug: true });

      await gateway.issuers();

      expect(log).toHaveBeenCalledWith('[IdealGateway] POST https://idealtest.secure-ing.com/ideal/iDeal');
      expect(log).toHaveBeenCalledWith(`[IdealGateway] Response:\n${DIRECTORY_RESPONSE}`);
    });

    it('should stay quiet by default', async () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => {});
      const { gateway } = createGateway(() => DIRECTORY_RESPONSE);

      await gateway.issuers();

      expect(log).not.toHaveBeenCalled();
    });
  });
});
