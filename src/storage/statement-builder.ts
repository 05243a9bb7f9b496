import { Store, type Quad } from 'n3';
import { FinalizedBuilderError } from '../utils/errors.js';

/**
 * Owned, append-only statement collection for one enrichment run.
 *
 * The linker writes through `add`/`addAll`; readers (the entity index) go
 * through `store`. `finalize()` hands the collection over for serialization
 * and rejects any later write. The underlying store has set semantics, so
 * adding a statement twice leaves the size unchanged.
 */
export class StatementBuilder {
    private readonly graph: Store;
    private finalized = false;

    constructor(store?: Store) {
        this.graph = store ?? new Store();
    }

    get size(): number {
        return this.graph.size;
    }

    get store(): Store {
        return this.graph;
    }

    get isFinalized(): boolean {
        return this.finalized;
    }

    /**
     * Insert one statement. Returns false when it was already present.
     */
    add(quad: Quad): boolean {
        if (this.finalized) throw new FinalizedBuilderError();

        const before = this.graph.size;
        this.graph.addQuad(quad);
        return this.graph.size > before;
    }

    /**
     * Insert statements in order; returns how many were new.
     */
    addAll(quads: Iterable<Quad>): number {
        let added = 0;
        for (const quad of quads) {
            if (this.add(quad)) added++;
        }
        return added;
    }

    finalize(): Store {
        this.finalized = true;
        return this.graph;
    }
}
