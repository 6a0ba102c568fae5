const UNSAFE_TAG_CHARACTERS = /[^A-Za-z0-9.-]/g;

/**
 * Make a branch name usable inside an image tag. Idempotent.
 */
export function sanitizeBranchName(branch: string): string {
  return branch.replace(UNSAFE_TAG_CHARACTERS, "-");
}
