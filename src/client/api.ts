import { z } from 'zod';

export const CSRF_COOKIE = 'csrftoken';

const count = z.union([z.number(), z.string()]);

export const voteResponseSchema = z.object({
  ok: z.unknown(),
  review_id: z.number().optional(),
  helpful_yes: count.optional(),
  helpful_no: count.optional(),
  user_vote: z.enum(['up', 'down']).nullish(),
  message: z.string().optional(),
});

export type VoteResponse = z.infer<typeof voteResponseSchema>;

export class VoteRequestError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = 'VoteRequestError';
    this.status = status;
  }
}

/** Read a cookie value; empty string when absent */
export function readCookie(name: string, cookieString: string = document.cookie): string {
  const match = cookieString.match(new RegExp(`(?:^|;)\\s*${name}\\s*=\\s*([^;]+)`));
  return match ? match[1] : '';
}

/**
 * POST a vote form to its endpoint and return the parsed JSON body.
 *
 * Error statuses still carry `{ ok: false, message }`, so the body is read
 * whatever the status. Throws VoteRequestError when the body is not the
 * expected JSON shape; transport failures propagate from fetch.
 */
export async function submitVote(action: string, body: FormData): Promise<VoteResponse> {
  const res = await fetch(action, {
    method: 'POST',
    headers: {
      'X-Requested-With': 'XMLHttpRequest',
      'X-CSRFToken': readCookie(CSRF_COOKIE),
    },
    body,
    credentials: 'same-origin',
  });

  const data: unknown = await res.json().catch(() => {
    throw new VoteRequestError(`HTTP ${res.status}: response is not JSON`, res.status);
  });

  const parsed = voteResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new VoteRequestError(`HTTP ${res.status}: unexpected vote response`, res.status);
  }
  return parsed.data;
}
