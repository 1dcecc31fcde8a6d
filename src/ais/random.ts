import type { GridfightSnapshot, playerid } from "../games";
import { SeededRandom, randomSeed } from "../common";
import { AIBase } from "./_base";

export class RandomAI extends AIBase {
    public readonly name: string;
    private rng: SeededRandom;

    constructor(seed?: number, name = "Random") {
        super();
        this.name = name;
        this.rng = new SeededRandom(seed ?? randomSeed());
    }

    public selectAction(snapshot: GridfightSnapshot, legal: readonly number[], player: playerid): number {
        if (legal.length === 0) {
            throw new Error(`Player ${player} has no legal actions on turn ${snapshot.turn}. This should never happen.`);
        }
        return this.rng.pick(legal);
    }
}
