/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 * Every call runs to completion even when a sibling fails; results keep input order.
 */
export async function settleConcurrent<T, R>(
    items: readonly T[],
    limit: number,
    fn: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
    const results: PromiseSettledResult<R>[] = new Array(items.length);
    const queue = items.entries();

    // Workers share one iterator, so each item is taken exactly once.
    const worker = async (): Promise<void> => {
        for (const [index, item] of queue) {
            try {
                results[index] = { status: "fulfilled", value: await fn(item) };
            } catch (reason) {
                results[index] = { status: "rejected", reason };
            }
        }
    };

    const workers = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));
    return results;
}

/** Rejection reasons of settled results, in input order. */
export function rejections<R>(results: readonly PromiseSettledResult<R>[]): unknown[] {
    const out: unknown[] = [];
    for (const result of results) {
        if (result.status === "rejected") out.push(result.reason);
    }
    return out;
}
