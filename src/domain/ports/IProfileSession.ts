import { PageDocument } from '../entities/PageDocument';

/**
 * An authenticated session able to load profile pages.
 * Navigation is stateful and non-reentrant: callers await one navigation
 * before starting the next.
 */
export interface IProfileSession {
    /** Whether per-section detail views can be loaded. */
    readonly supportsDetailViews: boolean;

    /**
     * Loads a page and returns its document. Once `signal` aborts the
     * navigation settles promptly, so the next one can start.
     * @throws NavigationError when the page cannot be reached or the navigation was aborted
     */
    navigate(url: string, signal?: AbortSignal): Promise<PageDocument>;

    /**
     * The most recently loaded document.
     * @throws ExtractionError when nothing has been loaded or the session is closed
     */
    currentDocument(): PageDocument;

    /** Releases the session. Safe to call more than once. */
    close(): Promise<void>;
}

/**
 * Opens a session. Authentication happens here and fails with AuthenticationError.
 */
export type ProfileSessionFactory = () => Promise<IProfileSession>;
