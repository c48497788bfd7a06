/**
 * Statistics and tree structure shared by every node in the search tree.
 *
 * Each node corresponds to a game position reached by applying a sequence of actions
 * from the root. States are not stored; they are recomputed by replaying actions
 * while descending the tree.
 */
type MCTSNodeBase<Action> = {
    /** Number of backpropagation passes through this node */
    visits: number;

    /** Number of those passes that ended in a win for the searching player */
    wins: number;

    /** Legal actions not yet expanded from this node, consumed front to back */
    untriedActions: Action[];

    /** Child nodes keyed by the structural key of the action that produced them */
    children: Map<string, MCTSChildNode<Action>>;
};

/**
 * Root of a search tree, created once per search from the position being decided.
 */
export type MCTSRoot<Action> = MCTSNodeBase<Action> & {
    parent: undefined;
    parentAction: undefined;
};

export type MCTSChildNode<Action> = MCTSNodeBase<Action> & {
    /** Parent node in the search tree (a back reference; the parent owns this node) */
    parent: MCTSNode<Action>;

    /** The action that led to this node from its parent */
    parentAction: Action;
};

export type MCTSNode<Action> = MCTSRoot<Action> | MCTSChildNode<Action>;
