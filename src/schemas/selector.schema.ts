import { z } from 'zod';

export const SelectorCandidatesSchema = z.array(z.string().min(1)).min(1);

export const SiteSelectorsSchema = z.object({
  usernameInput: SelectorCandidatesSchema,
  passwordInput: SelectorCandidatesSchema,
  submitButton: SelectorCandidatesSchema,
  continueButton: SelectorCandidatesSchema.optional(),
  loginSuccess: SelectorCandidatesSchema,
  loginError: SelectorCandidatesSchema,
  challenge: z.array(z.string().min(1)).default([]),
  profileReady: SelectorCandidatesSchema,
  editButton: SelectorCandidatesSchema,
  fieldInput: SelectorCandidatesSchema,
  saveButton: SelectorCandidatesSchema,
  editSurface: z.array(z.string().min(1)).default([]),
});
