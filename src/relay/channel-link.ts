/** Prefix Telegram puts in front of supergroup and channel chat ids */
const CHANNEL_ID_PREFIX = '-100';

/**
 * Builds the public `t.me` URL of a channel post.
 *
 * `@name` channels link by username; numeric ids use the `/c/` form, which
 * drops the `-100` prefix.
 */
export function channelPostUrl(channelId: string, messageId: number): string {
  if (channelId.startsWith('@')) {
    return `https://t.me/${channelId.slice(1)}/${messageId}`;
  }

  const internalId = channelId.startsWith(CHANNEL_ID_PREFIX)
    ? channelId.slice(CHANNEL_ID_PREFIX.length)
    : channelId.replace(/^-/, '');
  return `https://t.me/c/${internalId}/${messageId}`;
}

/**
 * Markdown caption pointing at the post's own public link.
 */
export function relayCaption(channelId: string, messageId: number): string {
  return `[#${messageId}](${channelPostUrl(channelId, messageId)})`;
}
