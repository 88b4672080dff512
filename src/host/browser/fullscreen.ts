// Narrow views of the DOM fullscreen API so the toggle can run against fakes
export interface FullscreenTarget {
  requestFullscreen(): Promise<void>;
}

export interface FullscreenDocument {
  readonly fullscreenElement: object | null;
  exitFullscreen(): Promise<void>;
}

// Enters fullscreen on `target`, or leaves it if anything is fullscreen.
// Resolves to whether the page is fullscreen afterwards.
export async function toggleFullscreen(target: FullscreenTarget, doc: FullscreenDocument): Promise<boolean> {
  if (doc.fullscreenElement) {
    await doc.exitFullscreen();
    return false;
  }
  await target.requestFullscreen();
  return true;
}
