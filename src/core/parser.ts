import { createRequire } from 'node:module';

import Parser from 'web-tree-sitter';

import { LanguageSetupError, ParseError } from './errors.js';
import { grammarFile } from './language.js';
import { CodeStats, emptyCodeStats, SupportedLanguage } from './types/index.js';

type SyntaxNode = Parser.SyntaxNode;

/** What a syntax node contributes to the statistics, if anything. */
type NodeCategory = 'function' | 'class';

/** Node types counted for one grammar. */
interface CountingRules {
    functionNodes: ReadonlySet<string>;
    classNodes: ReadonlySet<string>;
    /** Extra check for node types that only sometimes denote a class or struct. */
    classifyNode?: (node: SyntaxNode) => NodeCategory | undefined;
}

const ECMASCRIPT_RULES: CountingRules = {
    // Grammars before 0.21 call an anonymous function expression `function`.
    functionNodes: new Set(['function_declaration', 'function_expression', 'function', 'arrow_function', 'method_definition']),
    classNodes: new Set(['class_declaration']),
};

const COUNTING_RULES: Record<SupportedLanguage, CountingRules> = {
    Rust: {
        functionNodes: new Set(['function_item']),
        classNodes: new Set(['struct_item', 'enum_item']),
    },
    Go: {
        functionNodes: new Set(['function_declaration', 'method_declaration']),
        classNodes: new Set(),
        // `type_spec` covers structs, interfaces and named types alike; only struct bodies count.
        classifyNode: node => node.type === 'type_spec' && node.childForFieldName('type')?.type === 'struct_type'
            ? 'class'
            : undefined,
    },
    Python: {
        functionNodes: new Set(['function_definition']),
        classNodes: new Set(['class_definition']),
    },
    JavaScript: ECMASCRIPT_RULES,
    TypeScript: ECMASCRIPT_RULES,
    TSX: ECMASCRIPT_RULES,
    Java: {
        functionNodes: new Set(['method_declaration', 'constructor_declaration']),
        classNodes: new Set(['class_declaration', 'interface_declaration']),
    },
};

const require = createRequire(import.meta.url);

let runtimeReady: Promise<void> | undefined;
const grammarCache = new Map<SupportedLanguage, Promise<Parser.Language>>();

function initRuntime(): Promise<void> {
    runtimeReady ??= Parser.init().catch((error: unknown) => {
        runtimeReady = undefined;
        throw error;
    });
    return runtimeReady;
}

function loadGrammar(language: SupportedLanguage): Promise<Parser.Language> {
    let grammar = grammarCache.get(language);
    if (!grammar) {
        grammar = Parser.Language.load(resolveGrammarPath(language));
        grammarCache.set(language, grammar);
        // A failed load must not poison later attempts.
        void grammar.catch(() => grammarCache.delete(language));
    }
    return grammar;
}

/** Absolute path of the grammar bundled in `tree-sitter-wasms`. */
export function resolveGrammarPath(language: SupportedLanguage): string {
    return require.resolve(`tree-sitter-wasms/out/${grammarFile(language)}`);
}

/**
 * Creates a tree-sitter parser configured for the given language.
 * The WebAssembly runtime and each grammar are loaded once per process.
 */
export async function createParser(language: SupportedLanguage): Promise<Parser> {
    try {
        await initRuntime();
        const grammar = await loadGrammar(language);
        const parser = new Parser();
        parser.setLanguage(grammar);
        return parser;
    } catch (error) {
        throw new LanguageSetupError({ cause: error });
    }
}

/**
 * Parses source code and counts its function and class/struct definitions.
 * Nested definitions (closures, inner classes, methods) are counted as well.
 * @param filePath Only used to name the file in a {@link ParseError}.
 */
export function analyzeCode(parser: Parser, sourceCode: string, filePath: string, language: SupportedLanguage): CodeStats {
    let tree: Parser.Tree | null;
    try {
        tree = parser.parse(sourceCode);
    } catch (error) {
        throw new ParseError(filePath, { cause: error });
    }
    if (!tree) {
        throw new ParseError(filePath);
    }

    try {
        return countNodes(tree.rootNode, COUNTING_RULES[language]);
    } finally {
        tree.delete();
    }
}

function categorize(node: SyntaxNode, rules: CountingRules): NodeCategory | undefined {
    if (rules.functionNodes.has(node.type)) return 'function';
    if (rules.classNodes.has(node.type)) return 'class';
    return rules.classifyNode?.(node);
}

/**
 * Depth-first walk over named nodes. Anonymous nodes are keyword and punctuation tokens,
 * whose `type` is their literal text (a `function` keyword would otherwise look like a function).
 */
function countNodes(root: SyntaxNode, rules: CountingRules): CodeStats {
    const stats = emptyCodeStats();
    const pending: SyntaxNode[] = [root];

    let node = pending.pop();
    while (node) {
        const category = categorize(node, rules);
        if (category === 'function') stats.functionCount++;
        else if (category === 'class') stats.classStructCount++;

        // One push per child: a spread hits the argument limit on very wide nodes.
        for (const child of node.namedChildren) pending.push(child);
        node = pending.pop();
    }

    return stats;
}
