import { compareCodePoints } from '../utils/sort';
import type { PlaylistDocument } from '../types';

export const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8" standalone="yes"?>';

interface XmlElement {
  name: string;
  text?: string;
  children?: XmlElement[];
}

function escapeText(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

function renderElement(element: XmlElement, depth: number): string {
  const indent = '\t'.repeat(depth);
  const children = element.children ?? [];

  if (children.length > 0) {
    const inner = children.map(child => renderElement(child, depth + 1)).join('\n');
    return `${indent}<${element.name}>\n${inner}\n${indent}</${element.name}>`;
  }

  if (!element.text) {
    return `${indent}<${element.name} />`;
  }

  return `${indent}<${element.name}>${escapeText(element.text)}</${element.name}>`;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** MM/DD/YYYY HH:MM:SS in local time, independent of locale. */
export function formatAddedTimestamp(date: Date): string {
  const day = `${pad(date.getMonth() + 1)}/${pad(date.getDate())}/${date.getFullYear()}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Serialize a playlist in the layout Jellyfin reads from playlist.xml:
 * tab-indented, genres sorted, paths in the given order.
 */
export function renderPlaylistXml(doc: PlaylistDocument): string {
  const root: XmlElement = {
    name: 'Item',
    children: [
      { name: 'Added', text: doc.added },
      { name: 'LockData', text: 'false' },
      { name: 'LocalTitle', text: doc.title },
      {
        name: 'Genres',
        children: [...doc.genres]
          .sort(compareCodePoints)
          .map(genre => ({ name: 'Genre', text: genre })),
      },
      { name: 'OwnerUserId', text: doc.ownerUserId },
      {
        name: 'PlaylistItems',
        children: doc.paths.map(p => ({
          name: 'PlaylistItem',
          children: [{ name: 'Path', text: p }],
        })),
      },
      { name: 'PlaylistMediaType', text: 'Audio' },
    ],
  };

  return `${XML_DECLARATION}\n${renderElement(root, 0)}`;
}
