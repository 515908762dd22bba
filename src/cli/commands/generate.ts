import cliProgress from 'cli-progress';
import chalk from 'chalk';
import * as path from 'path';
import { getConfigManager } from '../../core/config';
import { getGenerationManager } from '../../core/generationManager';
import type { Package } from '../../core/package/package';

// generate 옵션
export interface GenerateCommandOptions {
  buildSystem?: string;
  output: string;
  platform?: string;
  abi?: string;
  osVersion?: string;
  stl?: string;
  ndkVersion?: number;
  concurrency: number;
}

/**
 * generate 명령어 핸들러
 * 지정하지 않은 빌드 시스템, 플랫폼, STL, NDK 버전은 설정의 기본값을 사용합니다.
 */
export async function generateCommand(packagePaths: string[], options: GenerateCommandOptions): Promise<void> {
  const config = getConfigManager().getConfig();
  const buildSystem = options.buildSystem ?? config.defaultBuildSystem;
  const platform = options.platform ?? config.defaultPlatform;
  const outputPath = path.resolve(options.output);

  console.log(chalk.cyan(`빌드 시스템: ${buildSystem}`));
  console.log(chalk.cyan(`대상 플랫폼: ${platform}`));
  console.log(chalk.cyan(`출력 경로: ${outputPath}\n`));

  const manager = getGenerationManager();
  const progressBar = new cliProgress.SingleBar(
    { format: ' {bar} | 패키지 로드 {value}/{total} | {name}', hideCursor: true },
    cliProgress.Presets.shades_classic
  );
  const onPackageLoaded = (pkg: Package): void => {
    progressBar.increment(1, { name: pkg.name });
  };

  progressBar.start(packagePaths.length, 0, { name: '' });
  manager.on('packageLoaded', onPackageLoaded);
  try {
    const summary = await manager.generate({
      buildSystem,
      outputPath,
      platform,
      packagePaths,
      platformArgs: {
        abi: options.abi,
        osVersion: options.osVersion,
        stl: options.stl ?? config.defaultStl,
        ndkVersion: options.ndkVersion ?? config.defaultNdkVersion,
      },
      concurrency: options.concurrency,
    });
    progressBar.stop();

    for (const file of summary.files) {
      console.log(chalk.green(`✓ ${path.relative(process.cwd(), file) || file}`));
    }
    for (const skipped of summary.skipped) {
      console.log(chalk.yellow(`건너뜀: ${skipped.module} (${skipped.requirement})`));
    }
    console.log(
      chalk.cyan(
        `\n${summary.packages.length}개 패키지, ${summary.requirements.length}개 대상, ` +
          `${summary.files.length}개 파일 생성 (${summary.duration}ms)`
      )
    );
  } finally {
    progressBar.stop();
    manager.off('packageLoaded', onPackageLoaded);
  }
}
