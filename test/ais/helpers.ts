import { GridfightGame } from "../../src/games";

/** Plays the first legal placement until `turns` placements are down. */
export const firstLegalTo = (seed: number, turns: number): GridfightGame => {
    const g = new GridfightGame(seed);
    while (g.turn < turns && g.phase === "placement") {
        g.applyAction(g.getLegalActions()[0]);
    }
    return g;
}
