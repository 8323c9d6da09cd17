/** LiveKit's Twirp API reports a missing room or dispatch as HTTP 404 / `not_found`. */
export function isLiveKitNotFound(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  if ('status' in error && error.status === 404) {
    return true;
  }
  if ('code' in error && error.code === 'not_found') {
    return true;
  }
  return /not found|does not exist/i.test(error.message);
}
