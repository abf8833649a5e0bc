export const INSTRUCTIONS = `
# Versioned Knowledge Base

The knowledge base lives in a version-controlled ledger (branches, commits,
merges) and is mirrored into a searchable index, one collection per branch.
The index follows the ledger automatically; you work through these MCP tools:

- **Search:** \`query_documents\`
- **Edit:** \`upsert_document\`, \`delete_document\` (uncommitted until you commit)
- **Version control:** \`ledger_commit\`, \`ledger_pull\`, \`ledger_push\`,
  \`ledger_checkout\`, \`ledger_merge\`, \`ledger_reset\`
- **Sync:** \`sync_status\`, \`sync_index\`
- **Import:** \`preview_import\`, \`execute_import\`

## When starting a session

- Call \`sync_status\`. If it reports a warning, follow its suggested action
  before editing anything.
- Query the current branch's collection for context relevant to the task.

## Editing

- Edits go to the ledger's working set and are indexed right away.
- Deletions are remembered: a deleted document is not re-added to the index by
  a later sync, and the deletion follows you across branch switches until it
  is committed.
- Commit with a clear message once a coherent set of edits is done.

## Branches and merges

- Each branch has its own index collection. \`ledger_checkout\` syncs it.
- If \`ledger_merge\` or \`ledger_pull\` reports conflicts, the index is left
  untouched. Resolve the conflicting rows in the ledger, commit, then run
  \`sync_index\`.

## Importing from another index

1. Run \`preview_import\` and read the conflicts.
2. Conflicts marked auto-resolvable can be left to \`execute_import\`.
3. For the rest, pass a resolution per conflict id: \`keep_source\`,
   \`keep_target\`, \`merge\`, \`skip\`, or \`custom\` with \`custom_content\`.
`.trim();
