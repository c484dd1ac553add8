import { describe, test, expect } from 'vitest';
import { Chapa } from '../../src/client';
import { ChapaDeserializationError } from '../../src/errors';
import { DIRECT_CHARGE_TYPES } from '../../src/types';
import { fetchReturning, recordedRequest, testConfig } from '../helpers';

const CHARGE_BODY = {
    message: 'Charge initiated',
    status: 'success',
    data: {
        auth_type: 'ussd',
        requestID: 'req-7f3a',
        meta: {
            message: 'Payment successfully initiated with telebirr',
            status: 'success',
            ref_id: 'CHDC-0001',
            payment_status: 'PENDING',
        },
        mode: 'test',
    },
};

describe('ChargesResource', () => {
    describe('create', () => {
        test('should POST /charges with the type query and snake_case body', async () => {
            const fetchMock = fetchReturning(CHARGE_BODY);
            const chapa = new Chapa(testConfig(), { fetch: fetchMock });

            const response = await chapa.charges.create('telebirr', {
                mobile: '0900123456',
                currency: 'ETB',
                amount: 10,
                txRef: 'charge-0001',
            });

            const request = recordedRequest(fetchMock);
            expect(request.method).toBe('POST');
            expect(request.url).toBe('https://chapa.test/v1/charges?type=telebirr');
            expect(request.body).toEqual({
                mobile: '0900123456',
                currency: 'ETB',
                amount: '10',
                tx_ref: 'charge-0001',
            });
            expect(response.data?.requestID).toBe('req-7f3a');
            expect(response.data?.meta.ref_id).toBe('CHDC-0001');
        });

        test('should pass an unlisted channel through unchanged', async () => {
            const fetchMock = fetchReturning({ message: 'Unsupported type', status: 'failed', data: null });
            const chapa = new Chapa(testConfig(), { fetch: fetchMock });

            await chapa.charges.create('kacha', { mobile: '0900123456', currency: 'ETB', amount: '5', txRef: 'c-2' });

            expect(recordedRequest(fetchMock).url).toBe('https://chapa.test/v1/charges?type=kacha');
        });

        test('should list the known channels', () => {
            expect(DIRECT_CHARGE_TYPES).toEqual(['telebirr', 'mpesa', 'amole', 'cbebirr', 'ebirr', 'awashbirr']);
        });
    });

    describe('verify', () => {
        test('should POST /validate and surface trx_ref and processor_id', async () => {
            const fetchMock = fetchReturning({
                message: 'Payment is completed',
                trx_ref: 'charge-0001',
                processor_id: 'TB-88213',
            });
            const chapa = new Chapa(testConfig(), { fetch: fetchMock });

            const response = await chapa.charges.verify('mpesa', { reference: 'CHDC-0001', client: 'ZW5jcnlwdGVk' });

            const request = recordedRequest(fetchMock);
            expect(request.url).toBe('https://chapa.test/v1/validate?type=mpesa');
            expect(request.body).toEqual({ reference: 'CHDC-0001', client: 'ZW5jcnlwdGVk' });
            expect(response).toEqual({
                message: 'Payment is completed',
                status: 'Unspecified',
                data: null,
                trx_ref: 'charge-0001',
                processor_id: 'TB-88213',
            });
        });

        test('should decode a failure envelope with null extras', async () => {
            const fetchMock = fetchReturning({ message: 'Invalid reference', status: 'failed', data: null }, 400);
            const chapa = new Chapa(testConfig(), { fetch: fetchMock });

            const response = await chapa.charges.verify('telebirr', { reference: 'nope', client: 'x' });

            expect(response).toEqual({
                message: 'Invalid reference',
                status: 'failed',
                data: null,
                trx_ref: null,
                processor_id: null,
            });
        });

        test('should reject a non-string trx_ref', async () => {
            const fetchMock = fetchReturning({ message: 'Payment is completed', trx_ref: 42 });
            const chapa = new Chapa(testConfig(), { fetch: fetchMock });

            await expect(
                chapa.charges.verify('telebirr', { reference: 'CHDC-0001', client: 'x' }),
            ).rejects.toBeInstanceOf(ChapaDeserializationError);
        });
    });
});
