/**
 * HTTP API tests
 *
 * Each test serves a fresh app on a loopback port, backed by the in-memory
 * store, and talks to it with fetch.
 */

import { SCHEMAS_REGISTRY } from '@jersey-studio/shared';
import { z } from 'zod';
import { MemoryDocumentStore } from '../../__tests__/helpers/memoryStore.js';
import { postJson, startTestServer, testConfig } from '../../__tests__/helpers/testServer.js';
import type { TestServer } from '../../__tests__/helpers/testServer.js';
import { createApp, listen } from '../../app.js';
import { COLLECTIONS } from '../../db/collections.js';
import { UnavailableStore } from '../../db/unavailableStore.js';
import { PLACEHOLDER_LOGO_URL } from '../../services/aiLogoService.js';

const MISSING_ID = '507f1f77bcf86cd799439011';
const ID_PATTERN = /^[0-9a-f]{24}$/;

const CreatedSchema = z.object({ id: z.string() });
const CheckoutResponseSchema = z.object({ order_id: z.string(), payment_id: z.string() });

const CHECKOUT_BODY = {
    customer_name: 'Test Customer',
    customer_email: 'customer@example.com',
    customer_phone: '9000000000',
    shipping_address: '1 Test Street',
    design: {},
    quantity: 15,
    method: 'upi',
};

function rosterForm(csv: Uint8Array | string, fields: Record<string, string> = { team_name: 'Test XI', sport: 'cricket' }): FormData {
    const form = new FormData();
    for (const [key, value] of Object.entries(fields)) {
        form.append(key, value);
    }
    form.append('csv', new Blob([csv], { type: 'text/csv' }), 'roster.csv');
    return form;
}

describe('API', () => {
    let store: MemoryDocumentStore;
    let server: TestServer;

    beforeEach(async () => {
        store = new MemoryDocumentStore();
        server = await startTestServer(store);
    });

    afterEach(async () => {
        await server.close();
    });

    describe('system routes', () => {
        it('GET / reports liveness', async () => {
            const res = await fetch(`${server.url}/`);
            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ message: 'Jersey Studio backend is running' });
        });

        it('GET /schema lists every entity schema', async () => {
            const res = await fetch(`${server.url}/schema`);
            const body = await res.json();

            expect(Object.keys(SCHEMAS_REGISTRY)).toEqual([
                'pricingtier',
                'jerseytemplate',
                'teamrosterentry',
                'team',
                'jerseydesign',
                'paymentintent',
                'jerseyorder',
                'adminuser',
            ]);
            expect(body).toEqual(SCHEMAS_REGISTRY);
            expect(body).toMatchObject({
                jerseyorder: { required: expect.arrayContaining(['customer_name', 'design', 'amount']) },
            });
        });

        it('GET /test reports a connected store and which variables are set', async () => {
            await server.close();
            server = await startTestServer(store, testConfig({ DATABASE_URL: 'mongodb://localhost:27017' }));
            await store.create(COLLECTIONS.templates, { name: 'Classic' });

            const res = await fetch(`${server.url}/test`);
            expect(await res.json()).toEqual({
                backend: 'running',
                database: 'available',
                connection_status: 'Connected',
                collections: ['jerseytemplate'],
                database_url: 'set',
                database_name: 'not set',
            });
        });

        it('answers unknown routes with 404', async () => {
            const res = await fetch(`${server.url}/api/nope`);
            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({
                error: 'Route not found: GET /api/nope',
                type: 'NotFoundError',
            });
        });

        it('rejects malformed JSON bodies with 400', async () => {
            const res = await fetch(`${server.url}/api/templates`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: '{"name":',
            });
            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                error: 'Invalid JSON in request body',
                type: 'ValidationError',
            });
            expect(store.operations).toEqual([]);
        });
    });

    describe('templates', () => {
        it('creates a template with catalog defaults and lists it', async () => {
            const created = await postJson(`${server.url}/api/templates`, { sport: 'cricket', name: 'Classic' });
            expect(created.status).toBe(200);
            const { id } = CreatedSchema.parse(await created.json());
            expect(id).toMatch(ID_PATTERN);

            const res = await fetch(`${server.url}/api/templates`);
            expect(await res.json()).toMatchObject([{
                id,
                sport: 'cricket',
                name: 'Classic',
                colors: ['#0A66C2', '#FF6F00'],
                is_public: true,
            }]);
        });

        it('preserves every submitted field', async () => {
            const template = {
                sport: 'football',
                name: 'Away Kit',
                colors: ['#000', '#FFD700'],
                preview_url: 'https://example.com/away.png',
                svg: '<svg viewBox="0 0 10 10"><rect width="10" height="10"/></svg>',
                is_public: false,
            };
            const created = await postJson(`${server.url}/api/templates`, template);
            const { id } = CreatedSchema.parse(await created.json());

            const res = await fetch(`${server.url}/api/templates`);
            expect(await res.json()).toEqual([{
                ...template,
                id,
                created_at: expect.any(String),
                updated_at: expect.any(String),
            }]);
        });

        it('accepts null for the optional preview and markup', async () => {
            const res = await postJson(`${server.url}/api/templates`, {
                sport: 'hockey',
                name: 'Blank',
                preview_url: null,
                svg: null,
            });
            expect(res.status).toBe(200);

            const templates = await (await fetch(`${server.url}/api/templates`)).json();
            expect(templates).toMatchObject([{ name: 'Blank', preview_url: null, svg: null }]);
        });

        it('rejects an unknown sport', async () => {
            const res = await postJson(`${server.url}/api/templates`, { sport: 'curling', name: 'Stones' });
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                type: 'ValidationError',
                error: expect.stringMatching(/^sport: /),
            });
            expect(store.operations).toEqual([]);
        });
    });

    describe('team import', () => {
        it('stores the parsed roster and returns its size', async () => {
            const res = await fetch(`${server.url}/api/team/import`, {
                method: 'POST',
                body: rosterForm('name,number,size\n Asha ,7,s\nRavi,10,\n'),
            });
            expect(res.status).toBe(200);
            const body = await res.json();
            expect(body).toEqual({ id: expect.stringMatching(ID_PATTERN), count: 2 });
            const { id } = CreatedSchema.parse(body);

            const team = await (await fetch(`${server.url}/api/team/${id}`)).json();
            expect(team).toMatchObject({
                id,
                team_name: 'Test XI',
                sport: 'cricket',
                roster: [
                    { name: 'Asha', number: '7', size: 'S' },
                    { name: 'Ravi', number: '10', size: 'M' },
                ],
            });
        });

        it('rejects an invalid size without storing anything', async () => {
            const res = await fetch(`${server.url}/api/team/import`, {
                method: 'POST',
                body: rosterForm('name,number,size\nAsha,7,XXXL\n'),
            });
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                type: 'ValidationError',
                error: expect.stringMatching(/^Invalid CSV: row 1 /),
                details: { row: 1, issues: [{ path: 'size', message: expect.any(String) }] },
            });
            expect(store.operations).toEqual([]);
        });

        it('rejects bytes that are not UTF-8', async () => {
            const res = await fetch(`${server.url}/api/team/import`, {
                method: 'POST',
                body: rosterForm(Uint8Array.from([0x6e, 0xff, 0x0a])),
            });
            expect(res.status).toBe(400);
            expect(await res.json()).toEqual({
                error: 'Invalid CSV: file is not valid UTF-8 text',
                type: 'EncodingError',
            });
            expect(store.operations).toEqual([]);
        });

        it('requires the team fields', async () => {
            const res = await fetch(`${server.url}/api/team/import`, {
                method: 'POST',
                body: rosterForm('name,number,size\n', { sport: 'cricket' }),
            });
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: 'team_name: team_name is required' });
        });

        it('requires the csv file', async () => {
            const form = new FormData();
            form.append('team_name', 'Test XI');
            form.append('sport', 'cricket');

            const res = await fetch(`${server.url}/api/team/import`, { method: 'POST', body: form });
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: 'No CSV file uploaded (expected form field "csv")' });
        });

        it('answers 404 for a team that does not exist', async () => {
            const res = await fetch(`${server.url}/api/team/${MISSING_ID}`);
            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({ error: 'Team not found', type: 'NotFoundError' });
        });
    });

    describe('AI logo', () => {
        it('returns the placeholder logo and three placements', async () => {
            const res = await postJson(`${server.url}/api/ai/logo`, { prompt: 'a roaring tiger' });
            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({
                logo_url: PLACEHOLDER_LOGO_URL,
                suggested_positions: [
                    { area: 'front_center', x: 0.5, y: 0.25, w: 0.3 },
                    { area: 'chest_left', x: 0.28, y: 0.22, w: 0.18 },
                    { area: 'sleeve_right', x: 0.82, y: 0.35, w: 0.2 },
                ],
            });
        });

        it('accepts an explicit null style', async () => {
            const res = await postJson(`${server.url}/api/ai/logo`, { prompt: 'a roaring tiger', style: null });
            expect(res.status).toBe(200);
            expect(await res.json()).toMatchObject({ logo_url: PLACEHOLDER_LOGO_URL });
        });

        it('requires a prompt', async () => {
            const res = await postJson(`${server.url}/api/ai/logo`, {});
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: 'prompt: prompt is required' });
        });
    });

    describe('checkout and orders', () => {
        beforeEach(async () => {
            await postJson(`${server.url}/api/admin/tiers`, { name: 'Starter', base_price: 999, min_quantity: 1 });
            await postJson(`${server.url}/api/admin/tiers`, { name: 'Pro', base_price: 899, min_quantity: 10 });
            await postJson(`${server.url}/api/admin/tiers`, { name: 'Elite', base_price: 799, min_quantity: 25 });
            store.operations.length = 0;
        });

        it('prices the order server-side', async () => {
            const res = await postJson(`${server.url}/api/checkout`, { ...CHECKOUT_BODY, amount: 1 });
            expect(res.status).toBe(200);
            const body = await res.json();
            expect(body).toMatchObject({ amount: 13485, currency: 'INR' });
            const { order_id: orderId } = CheckoutResponseSchema.parse(body);

            const order = await (await fetch(`${server.url}/api/orders/${orderId}`)).json();
            expect(order).toMatchObject({
                id: orderId,
                quantity: 15,
                pricing_tier: 'Pro',
                amount: 13485,
                status: 'Confirmed',
                payment_status: 'pending',
            });
        });

        it('accepts null team and template ids', async () => {
            const res = await postJson(`${server.url}/api/checkout`, { ...CHECKOUT_BODY, team_id: null, template_id: null });
            expect(res.status).toBe(200);
            const { order_id: orderId } = CheckoutResponseSchema.parse(await res.json());

            const order = await (await fetch(`${server.url}/api/orders/${orderId}`)).json();
            expect(order).toMatchObject({ team_id: null, template_id: null, amount: 13485 });
        });

        it('rejects deeply nested design layers with 400', async () => {
            const depth = 20000;
            const deepLayer = `{"path":${'['.repeat(depth)}1${']'.repeat(depth)}}`;
            const body = JSON.stringify({ ...CHECKOUT_BODY, design: { text_elements: ['LAYER'] } })
                .replace('"LAYER"', deepLayer);

            const res = await fetch(`${server.url}/api/checkout`, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body,
            });
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                error: 'design.text_elements.0: Nesting exceeds 32 levels',
                type: 'ValidationError',
            });
            expect(store.operations).toEqual([]);
        });

        it('rejects a zero quantity before touching storage', async () => {
            const res = await postJson(`${server.url}/api/checkout`, { ...CHECKOUT_BODY, quantity: 0 });
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: 'quantity: Quantity must be at least 1' });
            expect(store.operations).toEqual([]);
        });

        it('rejects a malformed order id with 400 before touching storage', async () => {
            const res = await fetch(`${server.url}/api/orders/abc`);
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({
                error: 'order_id: Invalid id: expected a 24-character hex string',
                type: 'ValidationError',
            });
            expect(store.operations).toEqual([]);
        });

        it('answers 404 for a well-formed id with no order', async () => {
            const res = await fetch(`${server.url}/api/orders/${MISSING_ID}`);
            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({ error: 'Not found', type: 'NotFoundError' });
        });

        it('overwrites the status and accepts the same status twice', async () => {
            const { order_id: orderId } = CheckoutResponseSchema.parse(
                await (await postJson(`${server.url}/api/checkout`, CHECKOUT_BODY)).json()
            );

            for (let attempt = 0; attempt < 2; attempt++) {
                const res = await postJson(`${server.url}/api/orders/${orderId}/status`, { status: 'Shipped' });
                expect(res.status).toBe(200);
                expect(await res.json()).toEqual({ ok: true });
            }

            const order = await (await fetch(`${server.url}/api/orders/${orderId}`)).json();
            expect(order).toMatchObject({ status: 'Shipped' });
        });

        it('accepts a status update for an order that does not exist', async () => {
            const res = await postJson(`${server.url}/api/orders/${MISSING_ID}/status`, { status: 'QC' });
            expect(res.status).toBe(200);
            expect(await res.json()).toEqual({ ok: true });
        });

        it('rejects an unknown status', async () => {
            const res = await postJson(`${server.url}/api/orders/${MISSING_ID}/status`, { status: 'Lost' });
            expect(res.status).toBe(400);
            expect(store.operations).toEqual([]);
        });

        it('lists orders newest first and honours the limit', async () => {
            for (const name of ['First', 'Second', 'Third']) {
                await postJson(`${server.url}/api/checkout`, { ...CHECKOUT_BODY, customer_name: name });
            }

            const res = await fetch(`${server.url}/api/orders?limit=2`);
            expect(await res.json()).toMatchObject([
                { customer_name: 'Third' },
                { customer_name: 'Second' },
            ]);
        });

        it('rejects a limit below 1', async () => {
            const res = await fetch(`${server.url}/api/orders?limit=0`);
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: 'limit: limit must be at least 1' });
        });
    });

    describe('payments', () => {
        it('mirrors a paid callback onto the order', async () => {
            const checkout = CheckoutResponseSchema.parse(
                await (await postJson(`${server.url}/api/checkout`, CHECKOUT_BODY)).json()
            );

            const res = await postJson(`${server.url}/api/payments/${checkout.payment_id}/status`, { status: 'paid' });
            expect(await res.json()).toEqual({ ok: true });

            const payment = await (await fetch(`${server.url}/api/payments/${checkout.payment_id}`)).json();
            expect(payment).toMatchObject({ order_id: checkout.order_id, method: 'upi', status: 'paid' });

            const order = await (await fetch(`${server.url}/api/orders/${checkout.order_id}`)).json();
            expect(order).toMatchObject({ payment_status: 'paid' });
        });

        it('answers 404 for an unknown payment', async () => {
            const res = await fetch(`${server.url}/api/payments/${MISSING_ID}`);
            expect(res.status).toBe(404);
            expect(await res.json()).toEqual({ error: 'Payment not found', type: 'NotFoundError' });
        });
    });

    describe('admin tiers', () => {
        it('creates tiers with defaults and lists them in insertion order', async () => {
            await postJson(`${server.url}/api/admin/tiers`, { name: 'Starter', base_price: 999 });
            await postJson(`${server.url}/api/admin/tiers`, { name: 'Pro', base_price: 899, min_quantity: 10, features: ['Name print'] });

            const tiers = await (await fetch(`${server.url}/api/admin/tiers`)).json();
            expect(tiers).toMatchObject([
                { name: 'Starter', base_price: 999, min_quantity: 1, features: [] },
                { name: 'Pro', base_price: 899, min_quantity: 10, features: ['Name print'] },
            ]);
        });

        it('rejects a negative price', async () => {
            const res = await postJson(`${server.url}/api/admin/tiers`, { name: 'Free', base_price: -1 });
            expect(res.status).toBe(400);
            expect(await res.json()).toMatchObject({ error: 'base_price: Base price cannot be negative' });
        });
    });

    describe('listen', () => {
        it('rejects when the port is already taken', async () => {
            const port = Number(new URL(server.url).port);
            const app = createApp({ store, config: testConfig() });

            await expect(listen(app, port, '127.0.0.1')).rejects.toMatchObject({ code: 'EADDRINUSE' });
        });
    });

    describe('storage failures', () => {
        it('answers 500 when a store operation fails', async () => {
            store.failure = 'connection reset';
            const res = await fetch(`${server.url}/api/templates`);
            expect(res.status).toBe(500);
            expect(await res.json()).toEqual({ error: 'connection reset', type: 'StorageError' });
        });

        it('keeps serving without a database', async () => {
            await server.close();
            server = await startTestServer(new UnavailableStore('not configured'));

            expect((await fetch(`${server.url}/`)).status).toBe(200);

            const res = await fetch(`${server.url}/api/orders`);
            expect(res.status).toBe(500);
            expect(await res.json()).toEqual({
                error: 'Database not available: not configured',
                type: 'StorageError',
            });

            const report = await (await fetch(`${server.url}/test`)).json();
            expect(report).toMatchObject({
                database: 'unavailable: not configured',
                connection_status: 'Not Connected',
                collections: [],
            });
        });
    });
});
