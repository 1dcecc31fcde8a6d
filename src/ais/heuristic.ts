import type { GridfightSnapshot, playerid, Position } from "../games";
import { LINES, controller, getActionCatalog, opponent } from "../games";
import { SeededRandom, randomSeed } from "../common";
import { AIBase } from "./_base";

// center > edges > corners
const POSITION_VALUES: readonly (readonly number[])[] = [
    [4, 7, 4],
    [7, 10, 7],
    [4, 7, 4],
];

const linesThrough = (row: number, col: number): readonly (readonly Position[])[] => {
    return LINES.filter(line => line.some(([r, c]) => r === row && c === col));
}

/**
 * Fixed weighted scoring with no search.
 *
 * Placement looks only at who controls which squares, never at hidden powers.
 * Dogfights weigh how much the square matters for a line, then the power
 * difference and the number of weapons left.
 */
export class HeuristicAI extends AIBase {
    public readonly name: string;
    private rng: SeededRandom;

    constructor(seed?: number, name = "Heuristic") {
        super();
        this.name = name;
        this.rng = new SeededRandom(seed ?? randomSeed());
    }

    public selectAction(snapshot: GridfightSnapshot, legal: readonly number[], player: playerid): number {
        if (legal.length === 0) {
            throw new Error(`Player ${player} has no legal actions on turn ${snapshot.turn}. This should never happen.`);
        }
        if (snapshot.phase === "placement") {
            return this.selectPlacement(snapshot, legal, player);
        } else if (snapshot.phase === "dogfights") {
            return this.selectDogfight(snapshot, legal, player);
        }
        return this.rng.pick(legal);
    }

    public scorePlacement(snapshot: GridfightSnapshot, index: number, player: playerid): number | undefined {
        const action = getActionCatalog().get(index);
        if (action.type !== "place") {
            return undefined;
        }
        const posValue = POSITION_VALUES[action.row][action.col];
        // stronger units on better squares
        const strength = (action.power - 2) / 8;
        const strengthBonus = strength * posValue * 0.5;
        const tacticalBonus = controller(snapshot.grid[action.row][action.col]) === opponent(player) ? 3 : 0;
        return posValue + strengthBonus + tacticalBonus + this.lineBonus(snapshot, player, action.row, action.col);
    }

    private selectPlacement(snapshot: GridfightSnapshot, legal: readonly number[], player: playerid): number {
        let bestScore = -Infinity;
        let best: number[] = [];
        for (const index of legal) {
            const score = this.scorePlacement(snapshot, index, player);
            if (score === undefined) {
                continue;
            }
            if (score > bestScore) {
                bestScore = score;
                best = [index];
            } else if (score === bestScore) {
                best.push(index);
            }
        }
        return this.rng.pick(best.length > 0 ? best : legal);
    }

    /**
     * Complete a line (50), block one (30), build (5), deny (3).
     */
    public lineBonus(snapshot: GridfightSnapshot, player: playerid, row: number, col: number): number {
        let bonus = 0;
        for (const line of linesThrough(row, col)) {
            let ours = 0;
            let theirs = 0;
            for (const [r, c] of line) {
                const owner = controller(snapshot.grid[r][c]);
                if (owner === player) {
                    ours++;
                } else if (owner !== undefined) {
                    theirs++;
                }
            }
            if (ours === 2 && theirs === 0) {
                bonus += 50;
            } else if (theirs === 2 && ours === 0) {
                bonus += 30;
            } else if (ours === 1 && theirs === 0) {
                bonus += 5;
            } else if (theirs === 1 && ours === 0) {
                bonus += 3;
            }
        }
        return bonus;
    }

    /**
     * How much this square matters for lines, ignoring the square itself.
     */
    public dogfightImportance(snapshot: GridfightSnapshot, player: playerid, row: number, col: number): number {
        let importance = 0;
        for (const line of linesThrough(row, col)) {
            let ours = 0;
            let theirs = 0;
            for (const [r, c] of line) {
                if (r === row && c === col) {
                    continue;
                }
                const owner = controller(snapshot.grid[r][c]);
                if (owner === player) {
                    ours++;
                } else if (owner !== undefined) {
                    theirs++;
                }
            }
            if (ours === 2 && theirs === 0) {
                importance += 100;
            } else if (theirs === 2 && ours === 0) {
                importance += 80;
            } else if (ours === 1 && theirs === 0) {
                importance += 10;
            } else if (theirs === 1 && ours === 0) {
                importance += 8;
            }
        }
        return importance;
    }

    private selectDogfight(snapshot: GridfightSnapshot, legal: readonly number[], player: playerid): number {
        const df = snapshot.dogfight;
        if (df === null) {
            return this.choose(legal, "pass");
        }
        const [row, col] = df.position;
        const units = snapshot.grid[row][col];
        const mine = units.find(u => u.owner === player);
        const theirs = units.find(u => u.owner !== player);
        if (mine === undefined || theirs === undefined) {
            return this.choose(legal, "pass");
        }
        const catalog = getActionCatalog();
        if (!legal.some(i => catalog.get(i).type === "weapon")) {
            return this.choose(legal, "pass");
        }

        const diff = mine.power - theirs.power;
        const importance = this.dogfightImportance(snapshot, player, row, col);
        const weapons = snapshot.resources[player].weapons.length;
        // a pending attack means any weapon now is a defence
        const defending = df.offense !== undefined;

        if (importance >= 80) {
            return this.choose(legal, "weapon");
        }
        if (defending) {
            if (importance >= 20 && weapons >= 2) {
                return this.choose(legal, "weapon");
            }
            if (diff >= -1) {
                return this.choose(legal, "weapon");
            }
            if (diff === -2 && weapons >= 3) {
                return this.choose(legal, "weapon");
            }
            return this.choose(legal, "pass");
        }
        if (importance >= 20 || diff <= 0 || weapons >= 3) {
            return this.choose(legal, "weapon");
        }
        return this.choose(legal, "pass");
    }

    private choose(legal: readonly number[], type: "weapon" | "pass"): number {
        const catalog = getActionCatalog();
        const matching = legal.filter(i => catalog.get(i).type === type);
        return this.rng.pick(matching.length > 0 ? matching : legal);
    }
}
