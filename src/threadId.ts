export interface ThreadIdentity {
  userId: string | null;
  lessonId: string | null;
}

const NO_IDENTITY: ThreadIdentity = { userId: null, lessonId: null };

/**
 * Split a thread id of the form `<user-id>-<lesson-id>` on its last hyphen.
 * User ids may contain hyphens themselves. Anything that does not yield two
 * non-empty parts decodes to no identity.
 */
export function decodeThreadId(threadId: unknown): ThreadIdentity {
  if (typeof threadId !== "string" || !threadId) return NO_IDENTITY;

  const separator = threadId.lastIndexOf("-");
  if (separator === -1) return NO_IDENTITY;

  const userId = threadId.slice(0, separator).trim();
  const lessonId = threadId.slice(separator + 1).trim();
  if (!userId || !lessonId) return NO_IDENTITY;

  return { userId, lessonId };
}
