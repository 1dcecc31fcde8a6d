import type { GridfightSnapshot, playerid } from "../games";

/**
 * Anything that can take a seat at the table. Agents only ever see deep
 * copies of the engine state and return one of the indices they were offered.
 */
export abstract class AIBase {
    public abstract readonly name: string;

    public abstract selectAction(snapshot: GridfightSnapshot, legal: readonly number[], player: playerid): number;

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    public onGameStart(player: playerid, seed: number): void {
        return;
    }

    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    public onGameEnd(snapshot: GridfightSnapshot, outcome: playerid | "draw"): void {
        return;
    }

    public toString(): string {
        return this.name;
    }
}
