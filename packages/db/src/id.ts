import KSUID from "ksuid";

function normalizeTag(tag: string): string {
  return tag
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * KSUID-based id generator.
 *
 * - With no tag: `27charKSUID...`
 * - With tag: `order_27charKSUID...`
 *
 * KSUIDs sort by creation second, so ids of rows written in the same run
 * order roughly by insertion time.
 */
export function generateId(tag = ""): string {
  const ksuid = KSUID.randomSync().string;
  const safeTag = normalizeTag(tag);
  return safeTag ? `${safeTag}_${ksuid}` : ksuid;
}
