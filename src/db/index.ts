export { getSupabase } from "./supabase.js";
export type { DigestRunRow, DigestRow, PromptVersionRow } from "./supabase.js";
export {
  contentHash,
  ensurePromptVersion,
  resolvePromptVersionIds,
  recordDigestRun,
} from "./record.js";
export type { RecordDigestRunParams } from "./record.js";
