/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

//==============================================================================
// Reconciliation engine lifecycle
//==============================================================================

/** The engine moved to a new state */
export const STATE_CHANGED = 'state-changed';

/** A block was compared and finalized in height order */
export const BLOCK_RECONCILED = 'block-reconciled';

/** A finalized block had at least one divergence */
export const DIVERGENCE_FOUND = 'divergence-found';

/** A block could not be compared (FETCH_FAILED or FATAL) */
export const BLOCK_UNVERIFIED = 'block-unverified';
