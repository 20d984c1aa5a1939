// Types for the monitored log sources

export const AWS_ELASTIC_LOAD_BALANCING = 'elasticloadbalancing';

export interface LoadBalancerEntity {
  readonly kind: 'load-balancer';
  readonly bucket: string;
  readonly prefix: string;
  readonly accountId: string;
  readonly region: string;
  readonly loadBalancerName: string;
}

export interface CdnEntity {
  readonly kind: 'cdn';
  readonly bucket: string;
  readonly prefix: string;
  readonly distributionId: string;
}

export type EntityDescriptor = LoadBalancerEntity | CdnEntity;

export interface LoadBalancerEntityOptions {
  bucket: string;
  prefix: string;
  loadBalancerName: string;
}

export interface CdnEntityOptions {
  bucket: string;
  prefix: string;
  distributionId: string;
}
