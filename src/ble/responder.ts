import {
	normalizeError,
	ResponderClosedError,
	ResponseAlreadySentError,
} from "../errors";

/**
 * One-shot handle that answers a single remote request.
 *
 * `send` succeeds at most once. It throws {@link ResponseAlreadySentError} on a
 * second call and {@link ResponderClosedError} when the remote side has gone
 * away (the peripheral closed the responder or delivery failed).
 */
export interface Responder<T> {
	send(response: T): void;
	/** True once a response was handed over, or the responder was closed */
	isSettled(): boolean;
}

/**
 * The peripheral's side of a responder: it can also close the handle when the
 * client disconnects before the core answers.
 */
export interface ResponderHandle<T> extends Responder<T> {
	close(reason?: string): void;
}

/**
 * Creates a responder that forwards the first response to `deliver`.
 *
 * @example Wrapping a peripheral stack callback
 * ```typescript
 * onReadRequest(offset, callback) {
 *   const responder = createResponder<ReadRequestResponse>((res) =>
 *     callback(RESULT_CODES[res.response], Buffer.from(res.value)),
 *   );
 *   events.trySend({ type: "readRequest", request, offset, responder });
 * }
 * ```
 */
export function createResponder<T>(
	deliver: (response: T) => void,
): ResponderHandle<T> {
	let sent = false;
	let closedReason: string | null = null;

	function send(response: T): void {
		if (sent) {
			throw new ResponseAlreadySentError();
		}
		if (closedReason !== null) {
			throw new ResponderClosedError(closedReason);
		}

		sent = true;
		try {
			deliver(response);
		} catch (e) {
			throw new ResponderClosedError(
				`Response could not be delivered: ${normalizeError(e).message}`,
			);
		}
	}

	function close(reason = "Responder is closed: remote side no longer waiting"): void {
		if (!sent && closedReason === null) {
			closedReason = reason;
		}
	}

	return {
		send,
		close,
		isSettled: () => sent || closedReason !== null,
	};
}
