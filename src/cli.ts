#!/usr/bin/env node
import { program } from 'commander';
import * as path from 'path';
import { BatchRunner } from './comparison/BatchRunner.js';
import { PdfComparator } from './comparison/PdfComparator.js';
import { isCompared } from './comparison/types.js';
import { imagesDirFor, loadSettings, type SettingOverrides } from './config/settings.js';
import { resolveRenderer } from './rendering/index.js';
import { ReportWriter } from './report/ReportWriter.js';
import { ConfigurationError, ReportWriteError } from './shared/errors.js';
import { ErrorHandler } from './shared/utils/index.js';

interface CompareOptions {
    candidateDir?: string;
    referenceDir?: string;
    reportDir?: string;
    dpi?: string;
    concurrency?: string;
    images?: boolean;
}

function fail(error: unknown): never {
    if (error instanceof ConfigurationError) {
        console.error(`❌ Invalid setting: ${error.message}`);
    } else if (error instanceof ReportWriteError) {
        console.error(`❌ Reports not saved: ${error.message}`);
    } else {
        console.error('❌ Comparison failed:', ErrorHandler.describe(error));
    }
    process.exit(1);
}

program
    .name('pdf-fidelity')
    .description('Score candidate PDFs against reference PDFs (text, pixels, page count)')
    .version('1.0.0');

program
    .command('compare')
    .description('Compare every PDF in the candidate directory with the reference PDF of the same name')
    .option('--candidate-dir <dir>', 'Directory of candidate PDFs')
    .option('--reference-dir <dir>', 'Directory of reference PDFs')
    .option('--report-dir <dir>', 'Output directory for reports')
    .option('--dpi <number>', 'Rasterization resolution')
    .option('--concurrency <number>', 'Cases compared at once')
    .option('--no-images', 'Do not export page renderings')
    .action(async (options: CompareOptions) => {
        try {
            const overrides: SettingOverrides = {
                candidateDir: options.candidateDir,
                referenceDir: options.referenceDir,
                reportDir: options.reportDir,
                dpi: options.dpi,
                concurrency: options.concurrency,
                saveImages: options.images === false ? false : undefined
            };
            const settings = loadSettings(overrides);

            console.log(`Candidate PDFs:  ${settings.candidateDir}`);
            console.log(`Reference PDFs:  ${settings.referenceDir}`);
            console.log(`Report output:   ${settings.reportDir}\n`);

            const renderer = await resolveRenderer();
            const runner = new BatchRunner(renderer, {
                candidateDir: settings.candidateDir,
                referenceDir: settings.referenceDir,
                dpi: settings.dpi,
                concurrency: settings.concurrency,
                imagesDir: imagesDirFor(settings)
            });

            if (runner.cases().length === 0) {
                console.error('❌ No PDF files found in either directory.');
                process.exit(1);
            }

            const summary = await runner.run((current, total, result) => {
                const note = isCompared(result) ? '' : ` (${result.error})`;
                console.log(`[${current}/${total}] ${result.name}: score=${result.overallScore}${note}`);
            });

            const paths = new ReportWriter().write(summary, settings.reportDir);

            console.log('\n📄 Reports saved:');
            console.log(`   Markdown: ${paths.markdown}`);
            console.log(`   JSON:     ${paths.json}`);
            console.log(`\n${'='.repeat(60)}`);
            console.log(`Overall Average Score: ${summary.averageScore.toFixed(4)}`);
            console.log(`Below ${summary.lowScoreThreshold}: ${summary.needsAttention.length}/${summary.total}`);
            console.log('='.repeat(60));

            if (summary.averageScore < 0.7) {
                console.log('⚠️  Many test cases differ significantly from the reference.');
            }
        } catch (error) {
            fail(error);
        }
    });

program
    .command('pair')
    .description('Compare a single candidate PDF with a reference PDF and print the result as JSON')
    .argument('<candidate>', 'Candidate PDF')
    .argument('<reference>', 'Reference PDF')
    .option('--dpi <number>', 'Rasterization resolution')
    .option('--name <name>', 'Case name used in the result')
    .action(async (candidate: string, reference: string, options: { dpi?: string; name?: string }) => {
        try {
            const settings = loadSettings({ dpi: options.dpi });
            const renderer = await resolveRenderer();
            const comparator = new PdfComparator(renderer, { dpi: settings.dpi });
            const result = await comparator.compare({
                name: options.name ?? path.basename(candidate, path.extname(candidate)),
                candidatePath: path.resolve(candidate),
                referencePath: path.resolve(reference)
            });
            console.log(JSON.stringify(result, null, 2));
        } catch (error) {
            fail(error);
        }
    });

program.parseAsync().catch(fail);
