/**
 * Normalizes inbound calls from any surface into a frozen GatewayRequest
 */

import { v4 as uuidv4 } from 'uuid';
import { z, ZodError } from 'zod';
import { ValidationError } from '../errors';
import { GatewayRequest, Operation } from '../types';
import { textItemId } from '../utils/ids';

export const MAX_SEARCH_LIMIT = 100;
export const MAX_BATCH_ITEMS = 10000;

const model = z.string().trim().min(1, 'model is required');
const collection = z.string().trim().min(1).max(255).optional();
const urgent = z.boolean().default(false);
const vector = z.array(z.number().finite()).min(1, 'vector must not be empty');
const text = z.string().refine(value => value.trim().length > 0, 'text must not be empty');

export const SearchInputSchema = z
  .object({
    model,
    vector: vector.optional(),
    text: text.optional(),
    limit: z.number().int().min(1).max(MAX_SEARCH_LIMIT).default(10),
    collection,
    filter: z.record(z.unknown()).optional(),
    urgent,
  })
  .refine(input => (input.vector === undefined) !== (input.text === undefined), {
    message: 'exactly one of vector or text is required',
    path: ['vector'],
  });

const EmbedItemSchema = z.union([
  text,
  z.object({ id: z.string().min(1).optional(), text }),
]);

export const EmbedInputSchema = z
  .object({
    model,
    text: text.optional(),
    texts: z.array(text).optional(),
    items: z.array(EmbedItemSchema).optional(),
    ids: z.array(z.string().min(1)).optional(),
    collection,
    urgent,
  })
  .transform((input, ctx) => {
    const entries: { id?: string; text: string }[] = [];
    if (input.text !== undefined) entries.push({ text: input.text });
    input.texts?.forEach(value => entries.push({ text: value }));
    input.items?.forEach(item => entries.push(typeof item === 'string' ? { text: item } : item));

    if (entries.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'text, texts or items is required', path: ['text'] });
      return z.NEVER;
    }
    if (entries.length > MAX_BATCH_ITEMS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `at most ${MAX_BATCH_ITEMS} items`, path: ['items'] });
      return z.NEVER;
    }
    if (input.ids && input.ids.length !== entries.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'ids must match the number of texts', path: ['ids'] });
      return z.NEVER;
    }

    const explicit = entries.some((entry, i) => (input.ids?.[i] ?? entry.id) !== undefined);
    return {
      model: input.model,
      urgent: input.urgent,
      payload: {
        texts: entries.map(entry => entry.text),
        ...(explicit && { ids: entries.map((entry, i) => input.ids?.[i] ?? entry.id ?? textItemId(entry.text)) }),
        ...(input.collection && { collection: input.collection }),
      },
    };
  });

const UpsertItemSchema = z
  .object({
    id: z.union([z.string().min(1), z.number().int().nonnegative().transform(String)]),
    text: text.optional(),
    vector: vector.optional(),
    payload: z.record(z.unknown()).optional(),
  })
  .refine(item => item.text !== undefined || item.vector !== undefined, {
    message: 'each item needs a text or a vector',
  });

export const UpsertInputSchema = z.object({
  model,
  items: z.array(UpsertItemSchema).min(1, 'items must not be empty').max(MAX_BATCH_ITEMS),
  collection,
  urgent,
});

export const DeleteInputSchema = z.object({
  model,
  ids: z.array(z.union([z.string().min(1), z.number().int().nonnegative().transform(String)])).min(1, 'ids must not be empty'),
  collection,
});

export interface RequestOptions {
  requestId?: string;
  now?: () => Date;
}

const toValidationError = (error: ZodError): ValidationError => {
  const [first] = error.issues;
  const field = first ? first.path.join('.') : undefined;
  const message = error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new ValidationError(message || 'Invalid request', field || undefined);
};

const parse = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error);
  }
  return parsed.data;
};

/**
 * Validate `input` for `operation` and build the request.
 * Throws ValidationError before anything is dispatched.
 */
export function buildRequest(operation: Operation, input: unknown, options: RequestOptions = {}): GatewayRequest {
  const requestId = options.requestId ?? uuidv4();
  const receivedAt = options.now ? options.now() : new Date();

  switch (operation) {
    case Operation.SEARCH: {
      const { model: targetModel, urgent: isUrgent, ...payload } = parse(SearchInputSchema, input);
      return Object.freeze({
        requestId,
        receivedAt,
        operation,
        targetModel,
        urgent: isUrgent,
        payload: Object.freeze(payload),
      });
    }
    case Operation.EMBED: {
      const parsed = parse(EmbedInputSchema, input);
      return Object.freeze({
        requestId,
        receivedAt,
        operation,
        targetModel: parsed.model,
        urgent: parsed.urgent,
        payload: Object.freeze(parsed.payload),
      });
    }
    case Operation.UPSERT: {
      const { model: targetModel, urgent: isUrgent, ...payload } = parse(UpsertInputSchema, input);
      return Object.freeze({
        requestId,
        receivedAt,
        operation,
        targetModel,
        urgent: isUrgent,
        payload: Object.freeze(payload),
      });
    }
    case Operation.DELETE: {
      const { model: targetModel, ...payload } = parse(DeleteInputSchema, input);
      return Object.freeze({
        requestId,
        receivedAt,
        operation,
        targetModel,
        urgent: false,
        payload: Object.freeze(payload),
      });
    }
  }
}
