import { range } from "lodash";
import { DeepReadonly, SeededRandom, shuffle } from "../../common";

export type playerid = 1|2;
export type Phase = "placement"|"dogfights"|"ended";
/** [row, col], both 0-based */
export type Position = [number, number];

export const GRID_SIZE = 3;
export const UNIT_POWERS: readonly number[] = range(2, 11);
export const HIDDEN_POWERS: readonly number[] = [2, 3, 9, 10];
export const WEAPON_TOKENS: readonly string[] = ["A", "K", "Q", "J"];
export const CARD_VALUES: readonly number[] = range(1, 14);
export const PILE_SIZE = CARD_VALUES.length;

// center first, then the edges, then the corners
export const DOGFIGHT_ORDER: readonly Position[] = [
    [1, 1],
    [0, 1], [1, 0], [1, 2], [2, 1],
    [0, 0], [0, 2], [2, 0], [2, 2],
];

export const LINES: readonly (readonly Position[])[] = [
    [[0, 0], [0, 1], [0, 2]],
    [[1, 0], [1, 1], [1, 2]],
    [[2, 0], [2, 1], [2, 2]],
    [[0, 0], [1, 0], [2, 0]],
    [[0, 1], [1, 1], [2, 1]],
    [[0, 2], [1, 2], [2, 2]],
    [[0, 0], [1, 1], [2, 2]],
    [[0, 2], [1, 1], [2, 0]],
];

export interface IUnit {
    owner: playerid;
    power: number;
    hidden: boolean;
}

/** Zero, one or two units. Two means the square is contested. */
export type Square = IUnit[];

export interface IPlayerResources {
    unplaced: number[];
    weapons: string[];
    drawPile: number[];
    discard: number[];
}

/**
 * The transient record of one contested square's negotiation.
 * `first` is the underdog's opening action, `second` the other player's reply
 * and `third` the underdog's counter response. `offense` names the player whose
 * weapon is waiting for a response.
 */
export interface IDogfightTurn {
    position: Position;
    underdog: playerid;
    other: playerid;
    actor: playerid;
    first?: number;
    second?: number;
    third?: number;
    offense?: playerid;
    complete: boolean;
}

/**
 * What agents may consult about the dogfight in progress.
 */
export interface IDogfightContext {
    position: Position;
    underdog: playerid;
    other: playerid;
    offense?: playerid;
}

export interface IGridfightState {
    game: "gridfight";
    seed: number;
    phase: Phase;
    currplayer: playerid;
    turn: number;
    grid: Square[][];
    resources: Record<playerid, IPlayerResources>;
    dogfightOrder: Position[];
    dogfightIndex: number;
    dogfight: IDogfightTurn | null;
    priority: playerid;
    gameover: boolean;
    winner: playerid[];
}

export type GridfightSnapshot = DeepReadonly<IGridfightState>;
type StateView = DeepReadonly<IGridfightState>;

export const opponent = (player: playerid): playerid => {
    return player === 1 ? 2 : 1;
}

export const isHiddenPower = (power: number): boolean => {
    return HIDDEN_POWERS.includes(power);
}

export const coords2algebraic = (row: number, col: number): string => {
    return "abc"[col] + (GRID_SIZE - row).toString();
}

export const freshResources = (rng: SeededRandom): IPlayerResources => {
    return {
        unplaced: [...UNIT_POWERS],
        weapons: [...WEAPON_TOKENS],
        drawPile: shuffle(CARD_VALUES, rng),
        discard: [],
    };
}

/**
 * Builds the opening position. Player one's pile is shuffled before player
 * two's, so the seed fixes both.
 */
export const initialState = (seed: number, rng: SeededRandom): IGridfightState => {
    const one = freshResources(rng);
    const two = freshResources(rng);
    return {
        game: "gridfight",
        seed,
        phase: "placement",
        currplayer: 1,
        turn: 0,
        grid: range(GRID_SIZE).map(() => range(GRID_SIZE).map((): Square => [])),
        resources: { 1: one, 2: two },
        dogfightOrder: [],
        dogfightIndex: 0,
        dogfight: null,
        priority: 2,
        gameover: false,
        winner: [],
    };
}

const copyResources = (res: DeepReadonly<IPlayerResources>): IPlayerResources => {
    return {
        unplaced: [...res.unplaced],
        weapons: [...res.weapons],
        drawPile: [...res.drawPile],
        discard: [...res.discard],
    };
}

/**
 * Structural copy of a snapshot. Every container is rebuilt, so nothing is
 * shared with the source.
 */
export const copyState = (state: StateView): IGridfightState => {
    let dogfight: IDogfightTurn | null = null;
    if (state.dogfight !== null) {
        const df = state.dogfight;
        dogfight = {
            ...df,
            position: [df.position[0], df.position[1]],
        };
    }
    return {
        game: state.game,
        seed: state.seed,
        phase: state.phase,
        currplayer: state.currplayer,
        turn: state.turn,
        grid: state.grid.map(row => row.map(sq => sq.map(u => ({ ...u })))),
        resources: { 1: copyResources(state.resources[1]), 2: copyResources(state.resources[2]) },
        dogfightOrder: state.dogfightOrder.map(([r, c]): Position => [r, c]),
        dogfightIndex: state.dogfightIndex,
        dogfight,
        priority: state.priority,
        gameover: state.gameover,
        winner: [...state.winner],
    };
}

export const controller = (square: DeepReadonly<Square>): playerid | undefined => {
    if (square.length === 1) {
        return square[0].owner;
    }
    return undefined;
}

export const isContested = (square: DeepReadonly<Square>): boolean => {
    return square.length === 2;
}

export const countControlled = (state: StateView, player: playerid): number => {
    let count = 0;
    for (const row of state.grid) {
        for (const sq of row) {
            if (controller(sq) === player) {
                count++;
            }
        }
    }
    return count;
}

export const hasLine = (state: StateView, player: playerid): boolean => {
    return LINES.some(line => line.every(([r, c]) => controller(state.grid[r][c]) === player));
}

export const dogfightContext = (state: StateView): IDogfightContext | undefined => {
    const df = state.dogfight;
    if (df === null) {
        return undefined;
    }
    return {
        position: [df.position[0], df.position[1]],
        underdog: df.underdog,
        other: df.other,
        offense: df.offense,
    };
}

/**
 * True when the dogfight has just begun and nobody has acted yet.
 */
export const isFreshDogfight = (state: StateView): boolean => {
    const df = state.dogfight;
    return df !== null && !df.complete && df.first === undefined && df.offense === undefined;
}

export const describeState = (state: StateView): string => {
    const lines: string[] = [`phase: ${state.phase}, turn ${state.turn}, player ${state.currplayer} to move`];
    for (const row of state.grid) {
        const cells = row.map(sq => {
            if (sq.length === 0) { return "[   ]"; }
            return "[" + sq.map(u => `${u.owner}:${u.hidden ? "?" : u.power}`).join(" ") + "]";
        });
        lines.push(cells.join(" "));
    }
    if (state.gameover) {
        lines.push(state.winner.length === 1 ? `winner: ${state.winner[0]}` : "draw");
    }
    return lines.join("\n");
}
