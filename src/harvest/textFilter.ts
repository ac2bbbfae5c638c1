/**
 * Terms that mark a pin's text as unsafe.
 */
export const TEXT_BLOCKLIST: readonly string[] = [
  'nude', 'naked', 'sexy', 'hot', 'adult', 'porn', 'xxx', 'erotic', '18+', 'onlyfans',
  'bikini', 'lingerie', 'booty', 'ass', 'tits', 'boobs', 'cleavage', 'thong', 'nsfw',
  'sex', 'topless', 'underwear', 'braless', 'see-through', 'explicit', 'fetish',
];

/**
 * Case-insensitive substring match of title + description against the blocklist.
 *
 * Matching is on substrings, not words: "ASSessment tips" and "photography"
 * ("hot") are rejected too. Known false positives are accepted behavior.
 */
export function isTextSafe(
  title: string,
  description: string,
  blocklist: readonly string[] = TEXT_BLOCKLIST,
): boolean {
  const text = `${title} ${description}`.toLowerCase();
  return !blocklist.some((kw) => text.includes(kw));
}
