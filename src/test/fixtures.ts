// Made-up resumes and job descriptions shared by the analysis tests.

export const STRONG_RESUME = `Jane Doe
jane.doe@example.com | (555) 123-4567

Summary
Backend engineer with six years of experience building data platforms and APIs for fintech teams.
Focused on reliability, clear documentation and mentoring.

Skills
Python, SQL, Docker, Kubernetes, AWS, PostgreSQL, Redis, Git, Linux, Terraform, React

Experience
Senior Software Engineer, Acme Payments, 2020 - 2024
• Led the migration of the billing service to Kubernetes, reducing deploy time by 60%
• Designed and implemented a PostgreSQL partitioning scheme for 2 billion ledger rows
• Automated infrastructure provisioning with Terraform across three AWS regions
• Mentored four engineers and organized weekly architecture reviews
• Reduced cloud spend by 25% by rightsizing clusters and scheduling batch workloads
• Launched an internal developer portal used by 120 engineers
Software Engineer, Northwind Labs, 2017 - 2020
• Developed Python ETL pipelines processing 40 GB of events per day
• Optimized SQL queries, improving dashboard load times by 35%
• Collaborated with product managers to deliver a customer analytics portal in React

Education
B.S. in Computer Science, State University, 2013 - 2017
Coursework in distributed systems, databases and algorithms; graduated with honors in 2017

Projects
• Open-source contributor to a Redis client library, adding cluster support and benchmarks
`;

export const SCENARIO_RESUME = `Skills
Python, SQL, data modeling and reporting

Experience
Data analyst at Contoso building weekly reports and dashboards for the finance team

Education
B.Sc. Statistics, Lakeside University
`;

export const SCENARIO_JD = 'We need an engineer with Python, SQL and Docker experience.';

export const BACKEND_JD = `Senior Backend Engineer
We are looking for an engineer with strong Python and SQL skills.
Experience with Docker, Kubernetes and AWS is required.
Nice to have: Kafka, GraphQL, Terraform.
`;
