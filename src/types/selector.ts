/** Ordered locator hypotheses for one page element, highest priority first. */
export type SelectorCandidates = readonly string[];

export type Resolution<T> =
  | { kind: 'Success'; selector: string; handle: T }
  | { kind: 'NotFound'; tried: string[] };

export interface SiteSelectors {
  usernameInput: SelectorCandidates;
  passwordInput: SelectorCandidates;
  submitButton: SelectorCandidates;
  /** Present on sites whose login asks for the username and password on separate screens. */
  continueButton?: SelectorCandidates;
  loginSuccess: SelectorCandidates;
  loginError: SelectorCandidates;
  challenge: SelectorCandidates;
  profileReady: SelectorCandidates;
  editButton: SelectorCandidates;
  fieldInput: SelectorCandidates;
  saveButton: SelectorCandidates;
  editSurface: SelectorCandidates;
}
