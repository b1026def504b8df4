// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples`
 * Purpose: Example screens exercising the component catalog.
 * Side-effects: none
 * @public
 */

export type { ComponentGalleryProps } from "./ComponentGallery";
export { ComponentGallery, galleryCategories } from "./ComponentGallery";
export { DataDisplayExamples } from "./DataDisplayExamples";
export { DataEntryExamples } from "./DataEntryExamples";
export { FeedbackExamples } from "./FeedbackExamples";
export { GeneralExamples } from "./GeneralExamples";
export { LayoutExamples } from "./LayoutExamples";
export { NavigationExamples } from "./NavigationExamples";
