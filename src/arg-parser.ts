/**
 * Command-line argument parsing for the space-search CLI
 */

export interface SearchCommand {
    command: "search";
    query: string;
    json: boolean;
    diagnostics: boolean;
    debug: boolean;
    timing: boolean;
}

export type CliCommand =
    | SearchCommand
    | { command: "examples" }
    | { command: "mcp" }
    | { command: "help" }
    | { command: "unknown"; value: string };

/**
 * Parse argv (without the node and script entries).
 * `search <words...>` and `--query <text>` both select search; a bare
 * leading flag implies search too.
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
    // Filter out standalone "--" which npm passes through
    const args = argv.filter(a => a !== "--");
    const first = args[0];
    if (first === undefined) {
        return { command: "help" };
    }

    switch (first) {
        case "help":
        case "--help":
        case "-h":
            return { command: "help" };
        case "examples":
            return { command: "examples" };
        case "mcp":
            return { command: "mcp" };
    }

    if (first !== "search" && !first.startsWith("-")) {
        return { command: "unknown", value: first };
    }

    const result: SearchCommand = {
        command: "search",
        query: "",
        json: false,
        diagnostics: false,
        debug: false,
        timing: false,
    };
    const words: string[] = [];

    for (let i = first === "search" ? 1 : 0; i < args.length; i++) {
        const arg = args[i];
        const nextArg = args[i + 1];

        if ((arg === "--query" || arg === "-q") && nextArg !== undefined) {
            result.query = nextArg;
            i++;
        } else if (arg === "--json") {
            result.json = true;
        } else if (arg === "--diagnostics") {
            result.diagnostics = true;
        } else if (arg === "--debug") {
            result.debug = true;
        } else if (arg === "--timing" || arg === "-t") {
            result.timing = true;
        } else if (arg === "--help" || arg === "-h") {
            return { command: "help" };
        } else if (arg !== undefined && !arg.startsWith("-")) {
            words.push(arg);
        }
    }

    if (result.query === "") {
        result.query = words.join(" ");
    }
    return result;
}
