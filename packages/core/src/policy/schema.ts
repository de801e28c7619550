import { z } from 'zod';

/**
 * Zod schemas for policy records arriving from external sources
 */

// =============================================================================
// Base Schemas
// =============================================================================

/**
 * Integer that may arrive as a number, a numeric string (pg returns BIGINT
 * columns as strings) or a bigint.
 */
export const IntegerSchema = z
  .union([
    z.number(),
    z.string().trim().regex(/^-?\d+$/, 'Expected an integer').transform(Number),
    z.bigint().transform(Number),
  ])
  .pipe(z.number().int().safe());

const CodeSchema = z.string().trim().min(1, 'Code cannot be empty');

// =============================================================================
// Policy Rule Schemas
// =============================================================================

/** Row shape returned by the policy SQL query */
export const PolicyRuleRowSchema = z.object({
  id: IntegerSchema,
  role_id: IntegerSchema,
  resource_code: CodeSchema,
  action_code: CodeSchema,
});

/** Rule object inside the API envelope's `data` array */
export const ApiPolicyRuleSchema = z.object({
  id: IntegerSchema.optional(),
  roleId: IntegerSchema,
  resourceCode: CodeSchema,
  actionCode: CodeSchema,
});

/** Response envelope used by the policy and version endpoints */
export const ApiEnvelopeSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
  data: z.unknown(),
});

// =============================================================================
// Engine Model Schema
// =============================================================================

const MatcherKindSchema = z.enum(['keyMatch', 'segment', 'exact']);

export const EngineModelSchema = z
  .object({
    domainMatcher: MatcherKindSchema,
    objectMatcher: MatcherKindSchema,
    actionMatcher: MatcherKindSchema,
    roleInheritance: z.boolean(),
  })
  .strict();

export type PolicyRuleRow = z.infer<typeof PolicyRuleRowSchema>;
export type ApiPolicyRule = z.infer<typeof ApiPolicyRuleSchema>;
export type ApiEnvelope = z.infer<typeof ApiEnvelopeSchema>;
