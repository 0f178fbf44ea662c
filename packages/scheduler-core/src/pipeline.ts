// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tickwork/scheduler-core/pipeline`
 * Purpose: Interface boundary to the event-pipeline library that consumes schedulers.
 * Scope: Observer/Observable ports and the notification union. The pipeline's operators live elsewhere.
 * Invariants: A subscription is a Closeable; notifications carry no scheduling information.
 * Side-effects: none
 * @public
 */

import type { Closeable } from "./closeable";

export interface Observer<T> {
  onNext(value: T): void;
  onError(error: Error): void;
  onCompleted(): void;
}

export interface Observable<T> {
  subscribe(observer: Observer<T>): Closeable;
}

export type Notification<T> =
  | { readonly kind: "next"; readonly value: T }
  | { readonly kind: "error"; readonly error: Error }
  | { readonly kind: "completed" };

/** Replay one notification onto an observer. */
export function deliver<T>(
  notification: Notification<T>,
  observer: Observer<T>
): void {
  switch (notification.kind) {
    case "next":
      observer.onNext(notification.value);
      return;
    case "error":
      observer.onError(notification.error);
      return;
    case "completed":
      observer.onCompleted();
      return;
  }
}
