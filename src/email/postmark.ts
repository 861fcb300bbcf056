import { readFile } from 'node:fs/promises';

export const POSTMARK_API_URL = 'https://api.postmarkapp.com';

export type PostmarkTemplateEmail = {
  From: string;
  To: string;
  TemplateId?: number;
  TemplateAlias?: string;
  TemplateModel: Record<string, string>;
  MessageStream?: string;
};

export type PostmarkSendResult = {
  To: string;
  SubmittedAt: string;
  MessageID: string;
  ErrorCode: number;
  Message: string;
};

export class PostmarkError extends Error {
  constructor(
    public status: number,
    public body: string,
  ) {
    super(`Postmark send failed (${status}): ${body}`);
    this.name = 'PostmarkError';
  }
}

/**
 * Resolve the server token from its direct value or from a file holding it.
 */
export async function getPostmarkServerToken(source: { server_token?: string; server_token_file?: string }): Promise<string | null> {
  if (source.server_token && source.server_token.trim()) {
    return source.server_token.trim();
  }

  if (!source.server_token_file) return null;
  try {
    const token = (await readFile(source.server_token_file, 'utf-8')).trim();
    return token.length ? token : null;
  } catch (err) {
    console.warn(`[Postmark] Cannot read token file ${source.server_token_file}: ${(err as Error).message}`);
    return null;
  }
}

/**
 * A template is referenced by numeric id or by alias; numeric strings are ids.
 */
export function templateReference(template: string): Pick<PostmarkTemplateEmail, 'TemplateId' | 'TemplateAlias'> {
  return /^\d+$/.test(template) ? { TemplateId: parseInt(template, 10) } : { TemplateAlias: template };
}

export async function sendPostmarkTemplateEmail(
  token: string,
  email: PostmarkTemplateEmail,
): Promise<PostmarkSendResult> {
  const res = await fetch(`${POSTMARK_API_URL}/email/withTemplate`, {
    method: 'POST',
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
      'X-Postmark-Server-Token': token,
    },
    body: JSON.stringify(email),
  });

  if (!res.ok) {
    const body = await res.text().catch(() => '');
    throw new PostmarkError(res.status, body || res.statusText);
  }

  return (await res.json()) as PostmarkSendResult;
}
