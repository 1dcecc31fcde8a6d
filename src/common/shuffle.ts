import { SeededRandom } from "./rng";

export function shuffle<T>(lst: readonly T[], rng: SeededRandom): T[] {
    const shuffled = [...lst];
    let remaining = shuffled.length;

    // While there remain elements to shuffle…
    while (remaining) {

        // Pick a remaining element…
        const randomIdx = rng.int(remaining--);

        // And swap it with the current element.
        const t = shuffled[remaining];
        shuffled[remaining] = shuffled[randomIdx];
        shuffled[randomIdx] = t;
    }

    return shuffled;
}
