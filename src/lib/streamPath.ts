export type StreamPath = {
  callId: string | null;
  queryAgent: string | null;
};

const PATH_CALL_ID_KEYS = new Set(['call_id', 'callid', 'call', 'id']);
const QUERY_CALL_ID_KEYS = ['call_id', 'CallId', 'call'];
const QUERY_AGENT_KEYS = ['agent', 'Agent', 'agent_name'];

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function firstQueryValue(query: URLSearchParams, keys: string[]): string | null {
  for (const key of keys) {
    const value = query.get(key)?.trim();
    if (value) {
      return value;
    }
  }
  return null;
}

function callIdFromSegment(rawSegment: string): string | null {
  const decoded = decodeSegment(rawSegment).trim();
  if (!decoded) {
    return null;
  }

  const separator = decoded.indexOf('=');
  if (separator > 0) {
    const key = decoded.slice(0, separator).toLowerCase();
    if (PATH_CALL_ID_KEYS.has(key)) {
      const value = decoded.slice(separator + 1).trim();
      return value || null;
    }
  }

  return decoded;
}

/**
 * Recovers the call id and fallback agent from a media stream request URL
 * such as `/ws/42`, `/ws/call_id=42`, `/ws/call_id%3D42` or `/ws?call_id=42`.
 *
 * The path is split into segments before anything is decoded and each segment
 * is decoded exactly once, so an encoded `/` or `%` inside an id survives.
 */
export function parseStreamPath(rawUrl: string): StreamPath {
  const queryStart = rawUrl.indexOf('?');
  const rawPath = queryStart === -1 ? rawUrl : rawUrl.slice(0, queryStart);
  const query = new URLSearchParams(queryStart === -1 ? '' : rawUrl.slice(queryStart + 1));

  const segments = rawPath.split('/').filter((segment) => segment.length > 0);
  if (segments[0] === 'ws') {
    segments.shift();
  }

  const pathCallId = segments.length > 0 ? callIdFromSegment(segments[0]) : null;

  return {
    callId: pathCallId ?? firstQueryValue(query, QUERY_CALL_ID_KEYS),
    queryAgent: firstQueryValue(query, QUERY_AGENT_KEYS)
  };
}
