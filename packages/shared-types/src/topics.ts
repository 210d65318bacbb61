import type { Topic } from "./contracts.ts";

/**
 * Study topic catalog served by the relay at `GET /api/topics`.
 *
 * Order is significant: the UI renders the buttons in this order.
 */
export const TOPIC_CATALOG: readonly Topic[] = [
  {
    id: "docker",
    name: "Docker and Containers",
    description: "Containers, images, volumes and networks",
  },
  {
    id: "aws",
    name: "AWS Core Services",
    description: "EC2, S3, RDS, Lambda and other foundational services",
  },
  {
    id: "cicd",
    name: "CI/CD and GitHub Actions",
    description: "Continuous integration and delivery, automated pipelines",
  },
  {
    id: "kubernetes",
    name: "Kubernetes",
    description: "Container orchestration, pods, services and deployments",
  },
  {
    id: "terraform",
    name: "Terraform and IaC",
    description: "Infrastructure as Code and automated provisioning",
  },
  {
    id: "security",
    name: "Cloud Security",
    description: "IAM, VPC, security groups, SSL/TLS",
  },
  {
    id: "monitoring",
    name: "Monitoring and Logging",
    description: "CloudWatch, Prometheus, Grafana, ELK stack",
  },
  {
    id: "microservices",
    name: "Microservices Architecture",
    description: "Design patterns, service-to-service communication, API gateways",
  },
];

// Shown by the UI when the relay cannot be reached for the real list.
export const FALLBACK_TOPICS: readonly Topic[] = TOPIC_CATALOG.slice(0, 4);
