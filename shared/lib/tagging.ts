import * as cdk from 'aws-cdk-lib/core';
import type { IConstruct } from 'constructs';

import type { EnvironmentName } from './tier-config';

export interface StandardTags {
  readonly projectName: string;
  readonly environment: EnvironmentName;
  /** Architecture label, e.g. '1-tier' */
  readonly tier: string;
}

/**
 * Tag every taggable resource below `scope`
 */
export function applyStandardTags(scope: IConstruct, tags: StandardTags): void {
  cdk.Tags.of(scope).add('Project', tags.projectName);
  cdk.Tags.of(scope).add('Environment', tags.environment);
  cdk.Tags.of(scope).add('Tier', tags.tier);
  cdk.Tags.of(scope).add('ManagedBy', 'aws-cdk');
}
