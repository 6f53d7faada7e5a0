import { z } from 'zod';

export const TransactionSchema = z.object({
  owner: z.string(),
  stamp: z.string(),
  year: z.number().int(),
  value: z.number().finite(),
}).strict();

export const BlockSchema = z.object({
  index: z.number().int().min(1),
  timestamp: z.number().finite(),
  transactions: z.array(TransactionSchema),
  proof: z.number().int().nonnegative(),
  previousHash: z.string().min(1),
}).strict();

export const ChainSchema = z.array(BlockSchema);

/** Body of GET /chain, as served by this node and expected from peers. */
export const ChainResponseSchema = z.object({
  chain: ChainSchema,
  length: z.number().int().nonnegative(),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
