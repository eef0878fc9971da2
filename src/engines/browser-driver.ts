import type { Resolution, SelectorCandidates, WriteMode } from '../types/index.js';

export interface DriverElement {
  readonly selector: string;
  click(): Promise<void>;
  readValue(): Promise<string>;
  readText(): Promise<string>;
  /** Focus and type character by character at a human pace. */
  type(text: string): Promise<void>;
  /** Clear the current contents, then write `text`. */
  replace(text: string, mode: WriteMode): Promise<void>;
}

export interface BrowserDriver {
  navigate(url: string): Promise<void>;
  /** First visible candidate right now; `NotFound` is a normal outcome. */
  resolve(candidates: SelectorCandidates): Promise<Resolution<DriverElement>>;
  /** Poll `resolve` until a candidate appears or `timeoutMs` passes. */
  waitFor(candidates: SelectorCandidates, timeoutMs: number): Promise<Resolution<DriverElement>>;
  /** True once none of the candidates is visible, false if one still is after `timeoutMs`. */
  waitForGone(candidates: SelectorCandidates, timeoutMs: number): Promise<boolean>;
  screenshot(): Promise<Buffer>;
  /** Humanized pause between interactions; random 1-3s when `ms` is omitted. */
  pause(ms?: number): Promise<void>;
}

export interface BrowserSession {
  readonly driver: BrowserDriver;
  close(): Promise<void>;
}

export interface SessionFactory {
  open(): Promise<BrowserSession>;
}
