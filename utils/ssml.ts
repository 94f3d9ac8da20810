import type { SsmlCapability } from '../types';

const PAUSE_MARKER = /\s*(?:\.\.\.|…)(?:\s*(?:\.\.\.|…))*\s*/g;

const escapeXml = (text: string): string =>
  text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');

export const stripSsml = (text: string): string =>
  text
    .replace(/<[^>]+>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

/**
 * Prepares a chunk for an engine that reads SSML. Ellipsis pause markers
 * left by the cleaning step become explicit breaks.
 */
export const annotateChunk = (text: string, capability: SsmlCapability): string => {
  if (capability === 'none') return text;

  const body = escapeXml(text.trim()).replace(PAUSE_MARKER, ' <break time="500ms"/> ').trim();
  return `<speak>${body}</speak>`;
};
