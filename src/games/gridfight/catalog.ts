import { DeepReadonly } from "../../common";
import { GRID_SIZE, IGridfightState, UNIT_POWERS, WEAPON_TOKENS, coords2algebraic, playerid } from "./board";

export interface IPlaceAction {
    type: "place";
    power: number;
    row: number;
    col: number;
}

export interface IWeaponAction {
    type: "weapon";
    slot: number;
}

export interface IPassAction {
    type: "pass";
}

export type Action = IPlaceAction | IWeaponAction | IPassAction;

/**
 * The fixed, fully enumerated action space.
 *
 * Placements come first (power-major, then row, then column), followed by one
 * entry per weapon slot and finally the pass. Indices never change for the
 * life of the process.
 */
export class ActionCatalog {
    private readonly actions: readonly Readonly<Action>[];

    constructor() {
        const actions: Action[] = [];
        for (const power of UNIT_POWERS) {
            for (let row = 0; row < GRID_SIZE; row++) {
                for (let col = 0; col < GRID_SIZE; col++) {
                    actions.push({ type: "place", power, row, col });
                }
            }
        }
        for (let slot = 0; slot < WEAPON_TOKENS.length; slot++) {
            actions.push({ type: "weapon", slot });
        }
        actions.push({ type: "pass" });
        this.actions = Object.freeze(actions.map(a => Object.freeze(a)));
    }

    public size(): number {
        return this.actions.length;
    }

    public get(index: number): Readonly<Action> {
        if (!Number.isInteger(index) || index < 0 || index >= this.actions.length) {
            throw new RangeError(`Action index ${index} is out of range (0..${this.actions.length - 1}).`);
        }
        return this.actions[index];
    }

    public indexOf(action: Action): number {
        return this.actions.findIndex(a => {
            switch (a.type) {
                case "place":
                    return action.type === "place" && a.power === action.power && a.row === action.row && a.col === action.col;
                case "weapon":
                    return action.type === "weapon" && a.slot === action.slot;
                case "pass":
                    return action.type === "pass";
            }
        });
    }

    public get passIndex(): number {
        return this.actions.length - 1;
    }

    public weaponIndex(slot: number): number {
        return this.indexOf({ type: "weapon", slot });
    }

    public placeIndex(power: number, row: number, col: number): number {
        return this.indexOf({ type: "place", power, row, col });
    }

    public describe(index: number): string {
        const action = this.get(index);
        switch (action.type) {
            case "place":
                return `place ${action.power}@${coords2algebraic(action.row, action.col)}`;
            case "weapon":
                return `weapon[${action.slot}]`;
            case "pass":
                return "pass";
        }
    }

    /**
     * Whether a single action is legal for the player in the given state.
     */
    public isLegal(state: DeepReadonly<IGridfightState>, player: playerid, index: number): boolean {
        const action = this.get(index);
        const resources = state.resources[player];
        if (state.phase === "placement") {
            if (action.type !== "place") {
                return false;
            }
            if (!resources.unplaced.includes(action.power)) {
                return false;
            }
            return !state.grid[action.row][action.col].some(u => u.owner === player);
        } else if (state.phase === "dogfights") {
            if (action.type === "weapon") {
                return action.slot < resources.weapons.length;
            }
            return action.type === "pass";
        }
        return false;
    }

    public legalMask(state: DeepReadonly<IGridfightState>, player: playerid): boolean[] {
        const mask: boolean[] = [];
        for (let i = 0; i < this.actions.length; i++) {
            mask.push(this.isLegal(state, player, i));
        }
        return mask;
    }

    public legalIndices(state: DeepReadonly<IGridfightState>, player: playerid): number[] {
        const indices: number[] = [];
        this.legalMask(state, player).forEach((legal, i) => {
            if (legal) {
                indices.push(i);
            }
        });
        return indices;
    }
}

let catalog: ActionCatalog | undefined;

/**
 * The shared catalog, built on first use and never mutated afterwards.
 */
export const getActionCatalog = (): ActionCatalog => {
    if (catalog === undefined) {
        catalog = new ActionCatalog();
    }
    return catalog;
}
