import * as cdk from 'aws-cdk-lib/core';
import * as autoscaling from 'aws-cdk-lib/aws-autoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import { Construct } from 'constructs';

import { createInstanceRole, encryptedRootVolume, machineImageFor } from './compute';

export interface WebFleetProps {
  readonly vpc: ec2.IVpc;
  readonly vpcSubnets: ec2.SubnetSelection;
  readonly securityGroup: ec2.ISecurityGroup;
  /** EC2 instance type name, e.g. 't3.micro' */
  readonly instanceType: string;
  readonly userData: ec2.UserData;
  readonly minCapacity: number;
  readonly desiredCapacity: number;
  readonly maxCapacity: number;
  /** Needed in public subnets without NAT */
  readonly associatePublicIpAddress?: boolean;
  /** @default 20 */
  readonly rootVolumeSize?: number;
  /** @default 60 */
  readonly targetCpuUtilization?: number;
  readonly roleDescription: string;
}

/**
 * Launch template + Auto Scaling group for one tier's instances.
 * Register it with a load balancer through `autoScalingGroup`.
 */
export class WebFleet extends Construct {
  public readonly role: iam.Role;
  public readonly launchTemplate: ec2.LaunchTemplate;
  public readonly autoScalingGroup: autoscaling.AutoScalingGroup;

  constructor(scope: Construct, id: string, props: WebFleetProps) {
    super(scope, id);

    const instanceType = new ec2.InstanceType(props.instanceType);
    this.role = createInstanceRole(this, 'Role', props.roleDescription);

    this.launchTemplate = new ec2.LaunchTemplate(this, 'LaunchTemplate', {
      instanceType,
      machineImage: machineImageFor(instanceType),
      securityGroup: props.securityGroup,
      role: this.role,
      userData: props.userData,
      requireImdsv2: true,
      associatePublicIpAddress: props.associatePublicIpAddress,
      blockDevices: [encryptedRootVolume(props.rootVolumeSize ?? 20)],
    });

    this.autoScalingGroup = new autoscaling.AutoScalingGroup(this, 'Asg', {
      vpc: props.vpc,
      vpcSubnets: props.vpcSubnets,
      launchTemplate: this.launchTemplate,
      minCapacity: props.minCapacity,
      desiredCapacity: props.desiredCapacity,
      maxCapacity: props.maxCapacity,
      healthCheck: autoscaling.HealthCheck.elb({ grace: cdk.Duration.minutes(5) }),
    });

    this.autoScalingGroup.scaleOnCpuUtilization('CpuScaling', {
      targetUtilizationPercent: props.targetCpuUtilization ?? 60,
    });
  }
}
