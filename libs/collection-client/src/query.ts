import { z } from 'zod';
import { CallerContractError } from './errors';
import type { CollectionQuery, CollectionQueryInput, Predicate } from './types';

/** Lone UTF-16 surrogates cannot be percent-encoded. */
function isEncodable(value: string): boolean {
  try {
    encodeURIComponent(value);
    return true;
  } catch {
    return false;
  }
}

const ENCODABLE_MESSAGE = 'must not contain unpaired surrogate characters';

const encodableString = z.string().refine(isEncodable, ENCODABLE_MESSAGE);

const predicateValueSchema = z.union([encodableString, z.number(), z.boolean()]);
const fieldSchema = z.string().min(1, 'Predicate field is required').refine(isEncodable, ENCODABLE_MESSAGE);
const operatorSchema = z.string().min(1, 'Predicate operator must not be empty').refine(isEncodable, ENCODABLE_MESSAGE);

const predicateSchema = z.union([
  z.object({
    field: fieldSchema,
    operator: operatorSchema.optional(),
    value: predicateValueSchema,
  }),
  z.tuple([fieldSchema, predicateValueSchema]),
  z.tuple([fieldSchema, operatorSchema, predicateValueSchema]),
]);

export const collectionQuerySchema = z.object({
  collectionName: z.string().trim().min(1, 'Collection name is required').refine(isEncodable, ENCODABLE_MESSAGE),
  pageSize: z.number().int().positive('Page size must be a positive integer').optional(),
  projection: z.array(z.string().min(1, 'Projection entries must not be empty')).default([]),
  predicates: z.array(predicateSchema).default([]),
  rawParams: z.array(z.string().min(1, 'Raw parameters must not be empty')).default([]),
  paginate: z.boolean().default(true),
});

type ParsedPredicate = z.infer<typeof predicateSchema>;

function toPredicate(input: ParsedPredicate): Predicate {
  if (Array.isArray(input)) {
    if (input.length === 3) {
      const [field, operator, value] = input;
      return { kind: 'withOperator', field, operator, value: String(value) };
    }
    const [field, value] = input;
    return { kind: 'implicit', field, value: String(value) };
  }
  if (input.operator !== undefined) {
    return { kind: 'withOperator', field: input.field, operator: input.operator, value: String(input.value) };
  }
  return { kind: 'implicit', field: input.field, value: String(input.value) };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validates caller input and freezes it into a CollectionQuery.
 *
 * @param defaultPageSize - used when the input has no pageSize
 * @throws CallerContractError on any invalid field, before anything is sent
 */
export function createCollectionQuery(input: CollectionQueryInput, defaultPageSize: number): CollectionQuery {
  const parsed = collectionQuerySchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new CallerContractError(`Invalid collection query: ${issues.join('; ')}`, issues);
  }

  const { data } = parsed;
  return Object.freeze({
    collectionName: data.collectionName,
    pageSize: data.pageSize ?? defaultPageSize,
    projection: Object.freeze([...data.projection]),
    predicates: Object.freeze(data.predicates.map((predicate) => Object.freeze(toPredicate(predicate)))),
    rawParams: Object.freeze([...data.rawParams]),
    paginate: data.paginate,
  });
}
