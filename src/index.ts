import 'dotenv/config'
import { loadConfig } from './config.js'
import { errorMessage, SourceUnavailableError } from './errors.js'
import { printConfigBanner, printResultsSummary } from './output/console.js'
import { writeOutput } from './output/output.js'
import { initRunDir } from './output/runDir.js'
import { createTerminalDisplay } from './output/terminalDisplay.js'
import { ArticleExtractor } from './pipeline/articleExtractor.js'
import { runDigestPipeline } from './pipeline/digestPipeline.js'
import { OpenAiSummaryBackend } from './pipeline/llmClient.js'
import { SummarizationAdapter, sharedSummaryCache } from './pipeline/summarizer.js'
import { parseUserProfile } from './profile.js'
import { HnClient } from './sources/hnClient.js'

// Main

async function main(): Promise<void> {
  const config = await loadConfig()
  const profile = parseUserProfile(config.profile)

  if (!process.env.OPENROUTER_API_KEY?.trim()) {
    throw new Error('OPENROUTER_API_KEY must be set')
  }

  printConfigBanner(config, profile)

  const display = createTerminalDisplay()

  const shutdown = () => {
    display.stop(false)

    console.log('\nInterrupted')

    process.exit(130) // Exit code for SIGINT (Ctrl+C).
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)

  const summarizer = new SummarizationAdapter(new OpenAiSummaryBackend(config.llm), {
    batchSize: config.summaryBatchSize,
    cache: config.summaryCache === 'memory' ? sharedSummaryCache : null
  })

  let result: Awaited<ReturnType<typeof runDigestPipeline>>

  try {
    result = await HnClient.use(
      {
        baseUrl: config.hnApiBaseUrl,
        timeoutMs: config.hnApiTimeoutMs,
        maxConcurrent: config.maxConcurrentFetches
      },
      source =>
        ArticleExtractor.use(
          {
            timeoutMs: config.articleFetchTimeoutMs,
            maxConcurrent: config.maxConcurrentFetches,
            maxContentLength: config.maxContentLength
          },
          extractor =>
            runDigestPipeline(
              profile,
              {
                source,
                extractor,
                summarizer,
                scoring: config.scoring,
                maxConcurrentFetches: config.maxConcurrentFetches
              },
              { onStage: event => display.stage(event.message) }
            )
        )
    )
  } catch (error) {
    display.stop(false)

    throw error
  }

  display.stop()

  const runDir = await initRunDir()
  const outputPaths = await writeOutput(result.digest, profile, {
    format: config.outputFormat,
    runDir,
    metadata: { model: config.llm.model }
  })

  console.log('')

  printResultsSummary(result.digest, outputPaths)
}

main().catch(error => {
  if (error instanceof SourceUnavailableError) {
    console.error(`\nHacker News is unreachable: ${errorMessage(error)}`)
  } else {
    console.error(error)
  }

  process.exit(1)
})
