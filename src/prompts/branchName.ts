export function buildBranchNamePrompt(diff: string): string {
    return `
Suggest a short, descriptive Git branch name for the changes in the following 'git diff'.

Rules:
- Use kebab-case: lowercase words separated by hyphens.
- Optionally prefix it with a Conventional Commits type and a slash (e.g. 'feat/add-login-form', 'fix/null-user-id').
- Use only lowercase letters, digits, hyphens and slashes.
- Reply with the branch name only, no explanation and no formatting.

${diff}

Branch name:
`;
}
