export const help: string[] = [
    `
## Commands

\`help\`: Display this message.
\`render\`: Print the system prompt with the source and target languages filled in.
\`check\`: Check the prompt template for its placeholders, its output format and the order of its steps.
\`translate <input> [--out FILE]\`: Translate a \`.json\` file (an object or array of strings) or a text file (one entry per line).
  - Progress is kept in a cache under the data directory, so an interrupted run resumes where it stopped.
  - Output defaults to \`<input>.<target language>.<ext>\` beside the input.
\`config\`: Show the current configuration.
\`config KEY\`: Show one configuration value.
\`config KEY VALUE\`: Store a configuration value. Lists are given as JSON, \`null\` clears a path.
`,
    `
### Flags

Flags override the stored configuration for a single run.

\`--source LANGUAGE\`: Language of the source text.
\`--target LANGUAGE\`: Language to translate into.
\`--provider anthropic|openai\`: Model provider.
\`--model STRING\`: Model name.
\`--template FILE\`: Prompt template file. It must contain \`{source_language}\` and \`{target_language}\`.
\`--batch INTEGER\`: Number of entries sent per request.
\`--platform STRING\`: Target platform. \`sakura\` uses arrow placeholders for code segments.
`,
    `
### Environment

\`ANTHROPIC_API_KEY\`, \`OPENAI_API_KEY\`: Provider credentials.
\`OPENAI_BASE_URL\`: Base URL for an OpenAI-compatible server.
\`TRANSLATOR_CONFIG\`: Config file path (default \`config.json\`).
\`OTLP_TRACES_URL\`, \`OTLP_TOKEN\`: Export traces to an OTLP endpoint.
`
];
