// CHANGE: Mutation substrate: single-writer/multi-reader lock plus one designated mutation worker
// WHY: Readers must never observe a half-mutated tree and writers never run concurrently;
//      all mutation is handed to one worker fiber by message passing instead of implicit context switches
// REF: REQ-CONCURRENCY
// SOURCE: https://effect.website/docs/concurrency/semaphore, https://effect.website/docs/concurrency/queue
// PURITY: SHELL
// EFFECT: Effect<MutationSubstrate, never, Scope>
// INVARIANT: write holds every permit; read holds one; mutation jobs run one at a time in offer order
// COMPLEXITY: O(1) per hand-off

import { Deferred, Effect, Queue, type Scope } from "effect";

/**
 * Upper bound on concurrent readers; a writer takes all of them.
 */
const READER_PERMITS = 64;

/**
 * Phase discipline for one tree (or a family of trees sharing the lock).
 */
export interface MutationSubstrate {
	/** Run `work` with shared (read) access. */
	readonly read: <A, E>(work: Effect.Effect<A, E>) => Effect.Effect<A, E>;
	/** Run `work` with exclusive (write) access; it has committed when this returns. */
	readonly write: <A, E>(work: Effect.Effect<A, E>) => Effect.Effect<A, E>;
	/** Hand `work` to the mutation worker and await its outcome. */
	readonly onMutationContext: <A, E>(
		work: Effect.Effect<A, E>,
	) => Effect.Effect<A, E>;
}

/**
 * CHANGE: Build the substrate inside a scope.
 * WHY: The worker fiber and its queue live exactly as long as the owning scope.
 *
 * @pure false (forks a fiber)
 * @effect Effect<MutationSubstrate, never, Scope>
 * @postcondition closing the scope interrupts the worker and shuts the queue down
 */
export const makeMutationSubstrate: Effect.Effect<
	MutationSubstrate,
	never,
	Scope.Scope
> = Effect.gen(function* () {
	const lock = yield* Effect.makeSemaphore(READER_PERMITS);
	const jobs = yield* Effect.acquireRelease(
		Queue.unbounded<Effect.Effect<void>>(),
		Queue.shutdown,
	);
	yield* Effect.forkScoped(Effect.forever(Effect.flatten(Queue.take(jobs))));

	const onMutationContext = <A, E>(
		work: Effect.Effect<A, E>,
	): Effect.Effect<A, E> =>
		Effect.gen(function* () {
			const done = yield* Deferred.make<A, E>();
			const job = Effect.exit(work).pipe(
				Effect.flatMap((exit) => Deferred.done(done, exit)),
				Effect.asVoid,
			);
			yield* Queue.offer(jobs, job);
			return yield* Deferred.await(done);
		});

	return {
		read: <A, E>(work: Effect.Effect<A, E>) => lock.withPermits(1)(work),
		write: <A, E>(work: Effect.Effect<A, E>) =>
			lock.withPermits(READER_PERMITS)(work),
		onMutationContext,
	} satisfies MutationSubstrate;
});
