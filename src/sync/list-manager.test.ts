import { beforeEach, describe, expect, it } from 'vitest';

import { CloudflareClient } from '../cloudflare/client.js';
import { FAKE_API_URL, FakeCloudflare } from '../cloudflare/fake-cloudflare.js';
import { ApiError, ValidationError } from '../errors.js';
import { makeDomain, makeLogger } from '../test-helpers.js';
import { RemoteListManager } from './list-manager.js';

const LISTS = /\/rules\/lists$/;
const ITEMS = /\/items$/;

describe('RemoteListManager', () => {
	let cloudflare: FakeCloudflare;
	let manager: RemoteListManager;
	const domain = makeDomain('a.com');

	beforeEach(() => {
		cloudflare = new FakeCloudflare();
		const client = new CloudflareClient({ baseUrl: FAKE_API_URL, logger: makeLogger(), fetch: cloudflare.fetch });
		manager = new RemoteListManager({
			client,
			listName: 'fail2ban',
			listDescription: 'Blocked IPs from Fail2Ban',
			itemComment: 'Blocked by Fail2Ban',
			logger: makeLogger(),
		});
	});

	describe('ensureList', () => {
		it('creates the list when the account has none by that name', async () => {
			cloudflare.seedList('acct-a.com', 'other');

			const listId = await manager.ensureList(domain);

			const creates = cloudflare.callsTo('POST', LISTS);
			expect(creates).toHaveLength(1);
			expect(creates[0]?.body).toEqual({ name: 'fail2ban', kind: 'ip', description: 'Blocked IPs from Fail2Ban' });
			expect(listId).toBe('list-2');
		});

		it('returns the existing id without creating', async () => {
			const seeded = cloudflare.seedList('acct-a.com', 'fail2ban');

			await expect(manager.ensureList(domain)).resolves.toBe(seeded);
			expect(cloudflare.callsTo('POST', LISTS)).toHaveLength(0);
		});

		it('is idempotent across calls', async () => {
			const first = await manager.ensureList(domain);
			const second = await manager.ensureList(domain);

			expect(second).toBe(first);
			expect(cloudflare.callsTo('POST', LISTS)).toHaveLength(1);
			expect(cloudflare.callsTo('GET', LISTS)).toHaveLength(2);
		});

		it('shares the list between domains on the same account', async () => {
			const a = await manager.ensureList(makeDomain('a.com', 'shared'));
			const b = await manager.ensureList(makeDomain('b.com', 'shared'));

			expect(b).toBe(a);
			expect(cloudflare.callsTo('POST', LISTS)).toHaveLength(1);
		});

		it('fails without creating when the lookup fails', async () => {
			cloudflare.respondWith(
				'GET',
				LISTS,
				403,
				JSON.stringify({ success: false, errors: [{ code: 9109, message: 'Invalid access token' }] }),
			);

			await expect(manager.ensureList(domain)).rejects.toThrow('Cloudflare API error for a.com: Invalid access token');
			expect(cloudflare.callsTo('POST', LISTS)).toHaveLength(0);
		});

		it('fails when the create response lacks an id', async () => {
			cloudflare.respondWith('POST', LISTS, 200, JSON.stringify({ success: true, result: { name: 'fail2ban' } }));

			await expect(manager.ensureList(domain)).rejects.toBeInstanceOf(ValidationError);
		});

		it('fails when the create is rejected', async () => {
			cloudflare.respondWith('POST', LISTS, 400, JSON.stringify({ success: false, errors: [{ message: 'quota exceeded' }] }));

			await expect(manager.ensureList(domain)).rejects.toBeInstanceOf(ApiError);
		});
	});

	describe('replaceListContents', () => {
		it('overwrites the list with one annotated entry per IP', async () => {
			const listId = cloudflare.seedList('acct-a.com', 'fail2ban', [{ ip: '9.9.9.9', comment: 'stale' }]);

			const count = await manager.replaceListContents(domain, listId, new Set(['5.6.7.8', '1.2.3.4']));

			expect(count).toBe(2);
			expect(cloudflare.callsTo('PUT', ITEMS)[0]?.body).toEqual([
				{ ip: '1.2.3.4', comment: 'Blocked by Fail2Ban' },
				{ ip: '5.6.7.8', comment: 'Blocked by Fail2Ban' },
			]);
			expect(cloudflare.listItems('acct-a.com', 'fail2ban')).toEqual([
				{ ip: '1.2.3.4', comment: 'Blocked by Fail2Ban' },
				{ ip: '5.6.7.8', comment: 'Blocked by Fail2Ban' },
			]);
		});

		it('submits an empty payload for an empty set', async () => {
			const listId = cloudflare.seedList('acct-a.com', 'fail2ban', [{ ip: '9.9.9.9', comment: 'stale' }]);

			await expect(manager.replaceListContents(domain, listId, new Set())).resolves.toBe(0);
			expect(cloudflare.callsTo('PUT', ITEMS)[0]?.body).toEqual([]);
			expect(cloudflare.listItems('acct-a.com', 'fail2ban')).toEqual([]);
		});

		it('fails on an empty response', async () => {
			cloudflare.respondWith('PUT', ITEMS, 502, '');

			await expect(manager.replaceListContents(domain, 'list-1', new Set(['1.2.3.4']))).rejects.toThrow('Empty response');
		});

		it('fails when the provider rejects the update', async () => {
			await expect(manager.replaceListContents(domain, 'missing', new Set(['1.2.3.4']))).rejects.toThrow('list not found');
		});
	});
});
