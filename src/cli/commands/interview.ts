/**
 * Interview command: asks the questions, renders the prompt and writes it
 * out as a vendor file or to the terminal.
 */

import { createDefaultCatalog } from '../../catalog/default-catalog.js';
import { loadCatalogFile } from '../../catalog/toml.js';
import type { QuestionCatalog } from '../../catalog/catalog.js';
import { loadConfig } from '../../config/index.js';
import type { Config } from '../../config/types.js';
import { runInterview } from '../../interview/engine.js';
import { ExperienceAwareStoppingPolicy, stoppingMessage } from '../../interview/stopping.js';
import {
  TerminalAnswerChannel,
  formatInfo,
  formatSectionHeader,
  formatSuccess,
  formatWarning,
  plainOutputWriter,
  type OutputWriter,
} from '../../interview/cli.js';
import type { InterviewOutcome } from '../../interview/types.js';
import { ModelRouterSelector, UnavailableSelector } from '../../planner/selectors.js';
import { Planner } from '../../planner/planner.js';
import {
  analyzeProjectContext,
  getProjectSummary,
  shouldEnhanceQuestions,
  type ProjectContext,
} from '../../project-context/analyzer.js';
import { ModelRenderer } from '../../render/model.js';
import { TemplateRenderer } from '../../render/template.js';
import type { Renderer } from '../../render/types.js';
import { ClaudeCodeNotInstalledError } from '../../router/claude-code-client.js';
import { DEFAULT_RETRY_CONFIG } from '../../router/retry.js';
import type { ModelRouter } from '../../router/types.js';
import { Logger } from '../../utils/logger.js';
import { writeVendorOutput } from '../../vendors/registry.js';
import type { VendorAdapter } from '../../vendors/types.js';
import type { CliCommandResult, CliDependencies, CliOptions } from '../types.js';

/** Ruler printed around the prompt when no vendor file is written. */
export const PROMPT_RULER = '='.repeat(60);

/**
 * Applies command line flags over the loaded configuration.
 */
export function applyCliOverrides(config: Config, options: CliOptions): Config {
  return {
    ...config,
    interview: {
      ...config.interview,
      ...(options.maxQuestions !== undefined && { max_questions: options.maxQuestions }),
      ...(options.offline && { offline: true }),
    },
    output: {
      ...config.output,
      ...(options.outputFormat !== undefined && { vendor: options.outputFormat }),
      ...(options.outputDir !== undefined && { directory: options.outputDir }),
    },
  };
}

async function connectRouter(
  config: Config,
  deps: CliDependencies,
  writer: OutputWriter,
  logger: Logger
): Promise<ModelRouter | undefined> {
  if (config.interview.offline) {
    logger.debug('offline_mode', {});
    return undefined;
  }
  try {
    return await deps.createRouter(config);
  } catch (error) {
    if (error instanceof ClaudeCodeNotInstalledError) {
      logger.warn('router_unavailable', { message: error.message });
      writer.writeLine(formatWarning('Claude Code is not available; continuing offline.'));
      return undefined;
    }
    throw error;
  }
}

function writeWelcome(writer: OutputWriter, context: ProjectContext, maxQuestions: number): void {
  writer.writeLine(formatSectionHeader('devprompt: coding preferences interview'));
  writer.writeLine(
    `I'll ask up to ${String(maxQuestions)} questions about how you code. Type 'skip' to pass on one, 'quit' to stop.`
  );
  if (shouldEnhanceQuestions(context)) {
    writer.writeLine(formatInfo(`Project detected: ${getProjectSummary(context)}`));
  }
}

function writeClosing(writer: OutputWriter, outcome: InterviewOutcome): void {
  if (outcome.reason === 'sufficient_context') {
    writer.writeLine('\n' + stoppingMessage(outcome.snapshot));
  } else if (outcome.reason === 'max_questions') {
    writer.writeLine('\nThat gives me a good picture of your needs.');
  }
}

/**
 * Handles the interview command.
 *
 * Exits 0 when the prompt was written or the user stopped the interview,
 * and throws for configuration, catalog, vendor and output errors.
 *
 * @throws UnknownVendorError before the interview when the vendor is unknown.
 */
export async function handleInterviewCommand(
  options: CliOptions,
  deps: CliDependencies
): Promise<CliCommandResult> {
  const loaded = await loadConfig({
    ...(options.configPath !== undefined && { path: options.configPath }),
    env: deps.env,
  });
  const config = applyCliOverrides(loaded, options);
  const writer = config.cli.colors ? deps.writer : plainOutputWriter(deps.writer);
  const logger = new Logger({ component: 'devprompt', debugMode: options.debug, sink: deps.logSink });

  let adapter: VendorAdapter | undefined;
  if (config.output.vendor !== '') {
    adapter = deps.vendors.get(config.output.vendor);
  }

  const catalog: QuestionCatalog =
    options.catalogPath !== undefined
      ? await loadCatalogFile(options.catalogPath)
      : createDefaultCatalog();
  const projectContext = analyzeProjectContext(deps.cwd, { logger: logger.child('ProjectContext') });
  const router = await connectRouter(config, deps, writer, logger);

  const planner = new Planner({
    catalog,
    selector:
      router !== undefined
        ? new ModelRouterSelector({ router, projectContext })
        : new UnavailableSelector(),
    timeoutMs: config.interview.adaptive_timeout_ms,
    logger: logger.child('Planner'),
  });

  if (config.cli.welcome && !options.noWelcome) {
    writeWelcome(writer, projectContext, config.interview.max_questions);
  }

  const reader = await deps.createReader();
  const outcome = await runInterview({
    catalog,
    planner,
    channel: new TerminalAnswerChannel(reader, deps.writer, { colors: config.cli.colors }),
    maxQuestions: config.interview.max_questions,
    ...(config.interview.adaptive_stopping && {
      stoppingPolicy: new ExperienceAwareStoppingPolicy(catalog.fields),
    }),
    logger: logger.child('Interview'),
  }).finally(() => {
    reader.close();
  });

  if (outcome.status === 'ABORTED') {
    writer.writeLine('\n' + formatWarning('Interview stopped. Nothing was written.'));
    return { exitCode: 0 };
  }
  writeClosing(writer, outcome);

  const renderer: Renderer =
    router !== undefined
      ? new ModelRenderer({
          router,
          fields: catalog.fields,
          retry: {
            config: {
              maxRetries: config.retry.max_retries,
              baseDelayMs: config.retry.base_delay_ms,
              maxDelayMs: Math.max(DEFAULT_RETRY_CONFIG.maxDelayMs, config.retry.base_delay_ms),
            },
          },
          logger: logger.child('Renderer'),
        })
      : new TemplateRenderer(catalog.fields);

  writer.writeLine(formatInfo('Generating your prompt...'));
  const prompt = await renderer.render(outcome.snapshot);

  if (adapter !== undefined) {
    const written = await writeVendorOutput(
      adapter,
      prompt,
      outcome.snapshot,
      config.output.directory
    );
    writer.writeLine(formatSuccess(`Wrote ${adapter.vendorName} rules to ${written}`));
  } else {
    writer.writeLine(PROMPT_RULER);
    writer.write(prompt);
    writer.writeLine(PROMPT_RULER);
  }

  return { exitCode: 0 };
}
