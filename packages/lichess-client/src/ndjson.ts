export type ReadNdjsonOptions = {
	/** Stops reading and rejects with the abort reason. */
	signal?: AbortSignal;
	/** Called for every chunk received, keep-alive newlines included. */
	onChunk?: () => void;
};

const abortedBy = (signal: AbortSignal) =>
	new Promise<never>((_resolve, reject) => {
		if (signal.aborted) reject(signal.reason);
		else
			signal.addEventListener("abort", () => reject(signal.reason), {
				once: true,
			});
	});

/**
 * Yields each JSON line of a newline-delimited body. Blank keep-alive lines
 * and lines that fail to parse are skipped.
 */
export async function* readNdjson(
	body: ReadableStream<Uint8Array>,
	options?: ReadNdjsonOptions,
): AsyncGenerator<unknown> {
	const reader = body.getReader();
	const decoder = new TextDecoder();
	const aborted = options?.signal ? abortedBy(options.signal) : null;
	let buffer = "";
	try {
		while (true) {
			const next = await (aborted
				? Promise.race([reader.read(), aborted])
				: reader.read());
			if (next.done) break;
			options?.onChunk?.();
			buffer += decoder.decode(next.value, { stream: true });
			while (true) {
				const boundary = buffer.indexOf("\n");
				if (boundary === -1) break;
				const line = buffer.slice(0, boundary);
				buffer = buffer.slice(boundary + 1);
				const parsed = parseLine(line);
				if (parsed !== undefined) yield parsed;
			}
		}
		buffer += decoder.decode();
		const parsed = parseLine(buffer);
		if (parsed !== undefined) yield parsed;
	} finally {
		if (options?.signal?.aborted) await reader.cancel(options.signal.reason);
		reader.releaseLock();
	}
}

export const parseLine = (line: string): unknown => {
	const text = line.trim();
	if (text.length === 0) return undefined;
	try {
		return JSON.parse(text);
	} catch {
		return undefined;
	}
};
