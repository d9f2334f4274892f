/**
 * @fileoverview Detailed help text for world-model CLI commands
 */

const HELP_TEXT = {
  main: `
world-model - Causal loop reasoning over the wellbeing framework graph

USAGE:
    world-model <command> [options]

COMMANDS:
    import <graph.json>         Import framework entities, nodes, edges and spans
    mine-loops                  Detect feedback loops and persist them
    stats                       Show mechanism graph statistics
    loops                       List persisted loops, optionally ranked by pillar
    plan <goal>                 Compute an intervention plan toward a goal
    simulate <kind:id> <delta>  Propagate a change through the graph
    what-if <scenario>          Simulate several pillar changes together
    help [command]              Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Set workspace directory (default: current directory)
    --verbose           Enable debug logging on stderr

Results are printed to stdout as JSON. Logs and errors go to stderr.
The database lives at <workspace>/.world-model/world-model.sqlite unless
WORLD_MODEL_DB_PATH is set.

EXAMPLES:
    world-model import fixtures/graph.json
    world-model mine-loops --max-loops 10
    world-model loops --pillar P001 --top-k 3
    world-model plan "spiritual growth" --entity pillar:P001
    world-model simulate pillar:P001 0.2 --max-steps 3

For more information on a specific command, run:
    world-model help <command>
`,

  import: `
world-model import - Import a mechanism graph from JSON

USAGE:
    world-model import <graph.json>

The file holds four arrays: frameworkEntities, nodes, edges and spans.
Framework-anchored nodes must reference an imported or existing framework
entity. Edge polarity defaults to the relation's polarity; a different
polarity needs "polarityOverridden": true. Edges may also carry their own
"spans" array.
`,

  'mine-loops': `
world-model mine-loops - Detect feedback loops and persist them

USAGE:
    world-model mine-loops [--max-loops N] [--max-cycle-length N] [--dry-run]

OPTIONS:
    --max-loops N         Number of loops to keep (default: 20)
    --max-cycle-length N  Longest cycle followed, in edges (default: 8)
    --dry-run             Print detected loops without persisting them
`,

  stats: `
world-model stats - Show mechanism graph statistics

USAGE:
    world-model stats
`,

  loops: `
world-model loops - List persisted feedback loops

USAGE:
    world-model loops [--pillar ID]... [--entity kind:id]... [--top-k N]

With --pillar or --entity, loops are ranked by relevance and the top N are
returned (default: 5). Each loop carries a one-line evidence summary.
`,

  plan: `
world-model plan - Compute an intervention plan toward a goal

USAGE:
    world-model plan <goal> [--entity kind:id]... [--max-steps N] [--max-depth N]

The goal is matched against detected entities first, then against node
labels. Steps only reference nodes present in the graph.
`,

  simulate: `
world-model simulate - Propagate a change through the graph

USAGE:
    world-model simulate <kind:id> <magnitude> [--max-steps N]

EXAMPLES:
    world-model simulate pillar:P001 0.2
    world-model simulate core_value:CV003 -0.1 --max-steps 3
`,

  'what-if': `
world-model what-if - Simulate several pillar changes together

USAGE:
    world-model what-if <scenario> --pillar ID=MAGNITUDE... [--max-steps N]

EXAMPLE:
    world-model what-if "more rest" --pillar P001=0.2 --pillar P004=-0.1
`,
};

type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
