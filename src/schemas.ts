import { z } from 'zod';

/** Schema for `gh pr view <url> --json state,url` */
export const PullRequestStatusSchema = z.object({
  state: z.enum(['OPEN', 'CLOSED', 'MERGED']),
  url: z.string(),
});
