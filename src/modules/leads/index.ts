/**
 * Leads Module - Public API
 *
 * Emails captured on public profiles, scored by traffic source.
 */

export type { Lead, CreateLeadInput, UpdateLeadInput } from './core/types.js';
export { MAX_LEAD_MESSAGE_LENGTH } from './core/types.js';

export type { LeadError, DatabaseError, InvalidInputError, LeadNotFoundError } from './core/errors.js';
export {
  createDatabaseError,
  createInvalidEmailError,
  createLeadNotFoundError,
  LEAD_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

export type { LeadRepository } from './core/ports.js';

export { DEFAULT_LEAD_SCORE, scoreForSource, isPlausibleEmail } from './core/scoring.js';

export {
  captureLead,
  type CaptureLeadDeps,
  type CaptureLeadInput,
} from './core/usecases/capture-lead.js';
export {
  listLeads,
  getLead,
  updateLead,
  deleteLead,
  type ManageLeadsDeps,
} from './core/usecases/manage-leads.js';

export { makeLeadRepo, type LeadRepoOptions } from './shell/repo/lead-repo.js';

export { makeLeadRoutes, type MakeLeadRoutesDeps } from './shell/rest/routes.js';
