import { DataFactory, type NamedNode, type Quad } from 'n3';
import type { CardLink, CardRecord, EntityRef, NamespaceConfig } from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { buildVocabulary, type Vocabulary } from '../graph/namespaces.js';
import type { StatementBuilder } from '../storage/statement-builder.js';

const { namedNode, literal, quad } = DataFactory;

// Characters that may not appear unescaped in an IRI, and `%` itself
const IRI_UNSAFE = /[\s<>"{}|\\^`%]/g;

export interface LinkerOptions {
    namespaces: NamespaceConfig;
    /** Label placed before the set code in `isPartOf` literals */
    setLabelPrefix?: string;
}

/**
 * Local part of a card node IRI: the card id, or else the display name with
 * spaces turned into underscores. Depends on nothing but the record, so the
 * same card always mints the same node.
 */
export function cardNodeId(card: CardRecord): string {
    return card.id ?? card.name.replace(/ /g, '_');
}

/**
 * Mints card nodes and the statements that tie them to matched entities.
 */
export class CardLinker {
    private readonly vocab: Vocabulary;
    private readonly cardNamespace: string;
    private readonly setLabelPrefix: string;

    constructor(options: LinkerOptions) {
        this.vocab = buildVocabulary(options.namespaces);
        this.cardNamespace = options.namespaces.card;
        this.setLabelPrefix = options.setLabelPrefix ?? DEFAULT_CONFIG.setLabelPrefix;
    }

    cardNode(card: CardRecord): NamedNode {
        const local = cardNodeId(card).replace(IRI_UNSAFE, (ch) => encodeURIComponent(ch));
        return namedNode(`${this.cardNamespace}${local}`);
    }

    /**
     * Statements describing `card` and its link from `entity`. Literals are
     * always tagged English, whatever language the name was resolved from.
     */
    statementsFor(card: CardRecord, entity: EntityRef): Quad[] {
        const node = this.cardNode(card);
        const { vocab } = this;

        const statements = [
            quad(node, vocab.type, vocab.thing),
            quad(node, vocab.label, literal(card.name, 'en')),
            quad(entity, vocab.subjectOf, node),
        ];

        if (card.type) {
            statements.push(quad(node, vocab.additionalType, literal(card.type, 'en')));
        }
        if (card.alignment) {
            statements.push(quad(node, vocab.additionalProperty, literal(`alignment: ${card.alignment}`, 'en')));
        }
        if (card.set) {
            statements.push(quad(node, vocab.isPartOf, literal(`${this.setLabelPrefix}: ${card.set}`, 'en')));
        }

        return statements;
    }

    /**
     * Append the link statements for a matched card to `builder`. Existing
     * statements, including ones from an earlier run, are never touched.
     */
    link(builder: StatementBuilder, card: CardRecord, entity: EntityRef): CardLink {
        const statements = this.statementsFor(card, entity);
        builder.addAll(statements);
        return { cardNode: this.cardNode(card), entity, statements };
    }
}
