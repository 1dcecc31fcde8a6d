import type { GridfightSnapshot, IGridfightState, IUnit, playerid } from "../games";
import { CARD_VALUES, HIDDEN_POWERS, copyState, opponent } from "../games";
import { SeededRandom, shuffle } from "../common";

/**
 * Builds one world the acting player cannot tell apart from the real one.
 *
 * The opponent's hidden units get powers drawn without replacement from the
 * hidden values the player cannot already account for (the opponent's hand and
 * their revealed units); once those run out the full set is used again. The
 * opponent's draw pile is rebuilt from every card not in their discard pile,
 * shuffled and cut to the size of the real pile. Units stay hidden and no pile
 * changes size. The player's own information is left alone.
 */
export const sampleHiddenInformation = (snapshot: GridfightSnapshot, player: playerid, seed: number): IGridfightState => {
    const rng = new SeededRandom(seed);
    const state = copyState(snapshot);
    const opp = opponent(player);
    const resources = state.resources[opp];

    const known = new Set<number>(resources.unplaced);
    const hidden: IUnit[] = [];
    for (const row of state.grid) {
        for (const square of row) {
            for (const unit of square) {
                if (unit.owner !== opp) { continue; }
                if (unit.hidden) {
                    hidden.push(unit);
                } else {
                    known.add(unit.power);
                }
            }
        }
    }

    let candidates = shuffle(HIDDEN_POWERS.filter(p => !known.has(p)), rng);
    for (const unit of hidden) {
        if (candidates.length === 0) {
            candidates = shuffle(HIDDEN_POWERS, rng);
        }
        const power = candidates.pop();
        if (power === undefined) {
            throw new Error("Ran out of hidden powers to sample. This should never happen.");
        }
        unit.power = power;
    }

    const size = resources.drawPile.length;
    const unseen = CARD_VALUES.filter(c => !resources.discard.includes(c));
    resources.drawPile = shuffle(unseen, rng).slice(0, size);
    return state;
}
