import type { ProgressEvent } from '../types.ts';

export class ConsoleProgressListener {
  private lastPercent = -1;
  private verbose = false;

  constructor(verbose = false) {
    this.verbose = verbose;
  }

  listen(event: ProgressEvent): void {
    switch (event.type) {
      case 'progress': {
        const percent = Math.round(event.fraction * 100);
        if (percent !== this.lastPercent) {
          this.lastPercent = percent;
          process.stdout.write(`    ${String(percent).padStart(3)}% ${event.description}\x1b[K\r`);
        }
        break;
      }

      case 'log':
        if (event.level === 'error') {
          console.error(`\n  ✗ ${event.message}`);
        } else if (event.level === 'warn') {
          console.warn(`\n  ⚠ ${event.message}`);
        } else if (this.verbose) {
          console.log(`\n  ${event.message}`);
        }
        break;

      case 'http:request':
        if (this.verbose && event.status !== 200) {
          const outcome = event.status ?? event.error;
          console.log(`\n  ↻ ${event.url} (${outcome}) attempt ${event.attempt}/${event.maxAttempts}`);
        }
        break;

      case 'book:acquired': {
        const skipped = event.skippedChapters > 0 ? `, ${event.skippedChapters} skipped` : '';
        console.log(`\n📖 ${event.title}`);
        console.log(`  ✓ ${event.totalChapters} chapters downloaded${skipped}`);
        console.log(`  📄 ${event.recordPath}`);
        break;
      }

      case 'epub:assembled': {
        const { totalVolumes, totalChapters, totalImages } = event;
        console.log(`\n📚 ${totalVolumes} volumes, ${totalChapters} chapters, ${totalImages} images`);
        break;
      }

      case 'processing:complete':
        console.log(`\n✨ EPUB created: ${event.outputPath}`);
        break;
    }
  }
}
