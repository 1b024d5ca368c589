import { z } from 'zod';

// ─── Response Envelope ────────────────────────────────────────────────────────
// Every v4 endpoint wraps its payload the same way. `success` is left unknown so
// a non-boolean value can be reported as an API failure rather than a parse error.

export const CloudflareEnvelopeSchema = z.object({
	success: z.unknown(),
	errors: z
		.array(z.object({ code: z.unknown(), message: z.unknown() }))
		.optional()
		.catch(undefined),
	result: z.unknown(),
	// biome-ignore lint/style/useNamingConvention: Cloudflare API field
	result_info: z
		.object({
			page: z.number().int().positive(),
			// biome-ignore lint/style/useNamingConvention: Cloudflare API field
			total_pages: z.number().int().nonnegative(),
		})
		.passthrough()
		.optional()
		.catch(undefined),
});
export type CloudflareEnvelope = z.infer<typeof CloudflareEnvelopeSchema>;

// ─── Account Lists ────────────────────────────────────────────────────────────

export const RemoteListSchema = z.object({
	id: z.string().min(1),
	name: z.string(),
	kind: z.string().optional(),
	description: z.string().optional(),
	// biome-ignore lint/style/useNamingConvention: Cloudflare API field
	num_items: z.number().optional(),
});
export type RemoteList = z.infer<typeof RemoteListSchema>;

export const RemoteListCollectionSchema = z.array(RemoteListSchema);

export type CreateListRequest = {
	name: string;
	kind: 'ip';
	description: string;
};

export type ListItem = {
	ip: string;
	comment: string;
};

// Item replacement is asynchronous on Cloudflare's side; the result only names the bulk operation
export const ReplaceItemsResultSchema = z
	.object({
		// biome-ignore lint/style/useNamingConvention: Cloudflare API field
		operation_id: z.string(),
	})
	.partial()
	.nullable();
export type ReplaceItemsResult = z.infer<typeof ReplaceItemsResultSchema>;

// ─── Zone Firewall Rules ──────────────────────────────────────────────────────

// Only the fields the sync reads are checked; anything else passes through untouched
export const FirewallRuleSchema = z
	.object({
		id: z.string().nullish(),
		description: z.string().nullish(),
	})
	.passthrough();
export type FirewallRule = z.infer<typeof FirewallRuleSchema>;

export const FirewallRuleCollectionSchema = z.array(FirewallRuleSchema);
export type PageInfo = {
	page: number;
	totalPages: number;
};

export type FirewallRulePage = PageInfo & {
	rules: Array<FirewallRule>;
};

export const CreatedFirewallRulesSchema = z.array(FirewallRuleSchema).min(1);

export type CreateFirewallRuleRequest = {
	action: 'block';
	description: string;
	priority: number;
	filter: {
		expression: string;
		paused: boolean;
		description: string;
	};
};
