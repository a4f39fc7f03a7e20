import { DestinationDescriptor, OwnerScope } from '../types/work-types';

// .../manage/folders/<id>, as copied from the web UI, on any host
const WEB_FOLDER_PATTERN = /\/manage\/folders\/(\d+)/;
// /users/<id>/projects/<id>, /teams/<id>/albums/<id>, /me/projects/<id>, ...
const API_FOLDER_PATTERN = /\/(users|me|teams)(?:\/(\d+))?\/(albums|projects)\/(\d+)/;
const VIDEO_URI_PATTERN = /\/videos\/(\d+)/;
const TRAILING_ID_PATTERN = /\/(\d+)\/?$/;

/**
 * Derive the destination folder and its owner from a worksheet reference.
 * Returns null when the reference names no folder; callers publish to the root.
 */
export function resolve(ref: unknown): DestinationDescriptor | null {
  if (typeof ref !== 'string' || ref.trim() === '') {
    return null;
  }

  const web = WEB_FOLDER_PATTERN.exec(ref);
  if (web?.[1]) {
    return { containerId: web[1], containerKind: 'project', ownerScope: { kind: 'none' } };
  }

  const api = API_FOLDER_PATTERN.exec(ref);
  if (api?.[1] && api[4]) {
    const contextType = api[1];
    const contextId = api[2];
    let ownerScope: OwnerScope = { kind: 'none' };

    // 'me' is the token's own account: no explicit id needed downstream
    if (contextType === 'users' && contextId) {
      ownerScope = { kind: 'user', id: contextId };
    } else if (contextType === 'teams' && contextId) {
      ownerScope = { kind: 'team', id: contextId };
    }

    return {
      containerId: api[4],
      containerKind: api[3] === 'albums' ? 'album' : 'project',
      ownerScope
    };
  }

  return null;
}

/**
 * Numeric video id from an API video URI such as "/videos/123456"
 */
export function parseVideoId(uri: string): string | null {
  return VIDEO_URI_PATTERN.exec(uri)?.[1] ?? null;
}

/**
 * Last numeric path segment of an API resource URI ("/teams/42" → "42")
 */
export function trailingNumericId(uri: string): string | null {
  return TRAILING_ID_PATTERN.exec(uri)?.[1] ?? null;
}

export function describeDestination(descriptor: DestinationDescriptor): string {
  const { containerId, ownerScope } = descriptor;
  const container = `${descriptor.containerKind === 'album' ? 'album' : 'folder'} ${containerId}`;
  switch (ownerScope.kind) {
    case 'user':
      return `${container} (user ${ownerScope.id})`;
    case 'team':
      return `${container} (team ${ownerScope.id})`;
    case 'none':
      return container;
  }
}
