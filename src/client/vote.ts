/**
 * Review "helpful" voting without a page reload.
 *
 * Intercepts `form.vote-form` submits, posts them to the form's action and
 * renders the counts and vote state the server sends back. Counts are
 * never computed locally. Failures leave the review block untouched.
 */
import { createScope } from './scope.js';
import { createLatestGuard, type LatestGuard } from './latest.js';
import { submitVote, type VoteResponse } from './api.js';
import type { ComponentHandle, VoteState } from './types.js';

export const VOTE_FORM_SELECTOR = 'form.vote-form';
export const REVIEW_BLOCK_SELECTOR = '[data-review-block], .review-block';

export interface VoteClientOptions {
  blockSelector?: string;
}

export function toVoteState(response: VoteResponse): VoteState {
  return {
    yes: response.helpful_yes === undefined ? undefined : String(response.helpful_yes),
    no: response.helpful_no === undefined ? undefined : String(response.helpful_no),
    userVote: response.user_vote ?? null,
  };
}

export function renderVoteState(block: Element, state: VoteState): void {
  const yesSpan = block.querySelector('.vote-yes');
  const noSpan = block.querySelector('.vote-no');
  if (yesSpan && state.yes !== undefined) yesSpan.textContent = state.yes;
  if (noSpan && state.no !== undefined) noSpan.textContent = state.no;

  for (const btn of block.querySelectorAll('.vote-btn')) {
    const active = state.userVote !== null && btn.classList.contains(state.userVote);
    btn.classList.toggle('active', active);
    btn.setAttribute('aria-pressed', active ? 'true' : 'false');
  }
}

/** The clicked button carries the vote choice; FormData(form) alone leaves it out. */
function buildVoteBody(form: HTMLFormElement, submitter: HTMLElement | null): FormData {
  const body = new FormData(form);
  if (
    (submitter instanceof HTMLButtonElement || submitter instanceof HTMLInputElement) &&
    submitter.name
  ) {
    body.set(submitter.name, submitter.value);
  }
  return body;
}

export function createVoteClient(root: ParentNode, options: VoteClientOptions = {}): ComponentHandle {
  const blockSelector = options.blockSelector ?? REVIEW_BLOCK_SELECTOR;
  const scope = createScope();
  const guards = new Map<Element, LatestGuard>();

  function guardFor(target: Element): LatestGuard {
    let guard = guards.get(target);
    if (!guard) {
      guard = createLatestGuard();
      guards.set(target, guard);
    }
    return guard;
  }

  async function handleSubmit(form: HTMLFormElement, submitter: HTMLElement | null): Promise<void> {
    const action = form.getAttribute('action');
    if (!action) {
      console.warn('[storefront] Vote form has no action; ignoring submit');
      return;
    }

    const block = form.closest(blockSelector);
    const guard = guardFor(block ?? form);
    const token = guard.next();

    let response: VoteResponse;
    try {
      response = await submitVote(action, buildVoteBody(form, submitter));
    } catch (err) {
      console.warn('[storefront] Vote failed:', err);
      return;
    }

    // A newer vote on this review, or teardown, supersedes this response
    if (scope.disposed || !guard.isLatest(token)) return;

    if (!response.ok) {
      if (response.message) console.info('[storefront]', response.message);
      return;
    }
    if (!block) return;

    renderVoteState(block, toVoteState(response));
  }

  for (const form of root.querySelectorAll<HTMLFormElement>(VOTE_FORM_SELECTOR)) {
    scope.listen(form, 'submit', (e) => {
      e.preventDefault();
      void handleSubmit(form, e.submitter);
    });
  }

  return {
    destroy: () => {
      for (const guard of guards.values()) guard.invalidate();
      scope.dispose();
    },
  };
}
