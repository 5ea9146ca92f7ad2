import { DocumentData, IndexClient, Schema, XapiandError } from './types';

/** Reserved body key carrying the schema of a model kind */
export const SCHEMA_KEY = '_schema';

/** Status the server answers with when the target index has no schema */
export const SCHEMA_MISSING_STATUS = 412;

export type PutOutcome =
  | { status: 'ok'; data: DocumentData }
  | { status: 'schema-missing'; error: XapiandError }
  | { status: 'failed'; error: unknown };

/**
 * Issue a single write and classify its result
 */
export async function attemptPut(
  client: IndexClient,
  index: string,
  body: DocumentData,
  id: string | null
): Promise<PutOutcome> {
  try {
    const data = await client.put(index, body, id);
    return { status: 'ok', data };
  } catch (error) {
    if (error instanceof XapiandError && error.statusCode === SCHEMA_MISSING_STATUS) {
      return { status: 'schema-missing', error };
    }
    return { status: 'failed', error };
  }
}

/**
 * Write a document, attaching the schema and retrying once if the index
 * has none yet. Any other failure is rethrown as is.
 */
export async function putProvisioned(
  client: IndexClient,
  index: string,
  body: DocumentData,
  id: string | null,
  schema: Schema
): Promise<DocumentData> {
  const outcome = await attemptPut(client, index, body, id);

  switch (outcome.status) {
    case 'ok':
      return outcome.data;
    case 'schema-missing':
      return client.put(index, { ...body, [SCHEMA_KEY]: schema }, id);
    case 'failed':
      throw outcome.error;
  }
}
