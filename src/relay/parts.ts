import type { Artifact } from '@a2a-js/sdk';

/**
 * Tagged content part. SDK `Part` values and parsed push payloads both fit it.
 */
export type ContentPart = { kind: 'text'; text: string } | { kind: 'file' } | { kind: 'data' };

/**
 * Concatenates the text parts, skipping file and data parts.
 * Returns null when there is no text part at all.
 */
export function collectPartsText(parts: readonly ContentPart[]): string | null {
  const texts: string[] = [];
  for (const part of parts) {
    switch (part.kind) {
      case 'text':
        texts.push(part.text);
        break;
      case 'file':
      case 'data':
        // not rendered by the relay
        break;
    }
  }
  return texts.length > 0 ? texts.join('') : null;
}

export function collectArtifactText(artifacts: readonly Artifact[] | undefined): string | null {
  const texts: string[] = [];
  for (const artifact of artifacts ?? []) {
    const text = collectPartsText(artifact.parts);
    if (text !== null) {
      texts.push(text);
    }
  }
  return texts.length > 0 ? texts.join('') : null;
}
