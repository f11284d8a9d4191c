import { writeFileSync } from 'node:fs';
import type { Command } from 'commander';
import { AnalysisTranscript } from '@/events/analysis-events';
import { handleGenericError, handleResultError } from '../error-formatting';
import { openSession, type CliDependencies } from '../dependencies';
import { resolveGitCredential } from './credentials';

export function registerAnalyzerCommands(program: Command, deps: CliDependencies): void {
  program
    .command('models')
    .description('List the foundation models the analyzer can use')
    .action(async () => {
      const session = openSession(program, deps);
      const client = deps.createAnalyzerClient(session.config, session.logger);

      const catalog = await client.listModels(session.config.defaultModelId);
      if (catalog.source === 'builtin') {
        console.error(
          `ℹ Backend at ${session.config.backendUrl} unavailable; showing the built-in list`,
        );
      }
      for (const model of catalog.models) {
        const marker = model.id === catalog.defaultModelId ? '*' : ' ';
        console.log(`${marker} ${model.id}  ${model.label}`);
      }
    });

  program
    .command('analyze')
    .description('Run a modernization analysis of a repository on the analyzer backend')
    .argument('<url>', 'repository URL')
    .option('--branch <branch>', 'branch to analyze', 'main')
    .option('--model <id>', 'model id (default: the backend default)')
    .option('--token <token>', 'personal access token')
    .option('--ssh-key-file <path>', 'private key file for SSH clones')
    .option('-o, --output <file>', 'write the report to a file instead of stdout')
    .action(
      async (
        url: string,
        options: {
          branch: string;
          model?: string;
          token?: string;
          sshKeyFile?: string;
          output?: string;
        },
      ) => {
        const credential = resolveGitCredential(options);
        if (!credential.ok) handleResultError(credential, 'Analysis not started');

        const session = openSession(program, deps);
        const client = deps.createAnalyzerClient(session.config, session.logger);
        const transcript = new AnalysisTranscript();

        const streamed = await client.analyze(
          {
            url,
            ...credential.value,
            branch: options.branch,
            ...(options.model ? { modelId: options.model } : {}),
          },
          (event) => {
            transcript.apply(event);
            if (event.event === 'status') session.progress.step(`⏳ ${event.data}`);
            if (event.event === 'tool_use') session.progress.step(`🔧 ${event.data}`);
          },
        );
        if (!streamed.ok) handleResultError(streamed, 'Analysis failed');
        if (transcript.error !== undefined) handleGenericError('Analysis failed', transcript.error);

        if (options.output) {
          writeFileSync(options.output, transcript.report);
          session.progress.step(`✅ Report written to ${options.output}`);
        } else {
          console.log(transcript.report);
        }
      },
    );
}
