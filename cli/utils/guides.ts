/**
 * Informational screens for `graphport import --guide` / `--queries`
 */

export function printQuickStart(): void {
  console.log(`
Quick Start

  1. START NEO4J
     - Neo4j Desktop: https://neo4j.com/download/
     - or Docker:
         docker run -p 7474:7474 -p 7687:7687 \\
           -e NEO4J_AUTH=neo4j/password neo4j:5

  2. EXPORT YOUR GRAPH
     - property-graph JSON: { "nodes": [...], "relationships": [...] }
     - or a ready-made script: { "cypherScript": "CREATE ...; CREATE ...;" }

  3. LOAD IT
     graphport import my_graph.json --password yourpassword
     graphport import my_graph.json --use-script      # run cypherScript instead

  4. EXPLORE
     - Neo4j Browser: http://localhost:7474
     - Run: MATCH (n) RETURN n

  5. LET AN AGENT QUERY IT (read-only)
     graphport mcp-server --password yourpassword
`);
}

export function printSampleQueries(): void {
  console.log(`
Sample Cypher Queries

  -- Show all nodes
  MATCH (n) RETURN n

  -- Show all relationships
  MATCH (a)-[r]->(b) RETURN a, r, b

  -- Find nodes by label
  MATCH (p:person) RETURN p

  -- Find paths between nodes
  MATCH path = (a)-[*1..3]->(b)
  WHERE a.label = 'Dr. Smith'
  RETURN path

  -- Count nodes by label
  MATCH (n) RETURN labels(n)[0] AS type, count(n) AS count

  -- Authors and their papers
  MATCH (p:person)-[:authored]->(paper:paper)
  RETURN p.label AS author, paper.label AS paper

  -- Nodes still carrying the import marker
  MATCH (n) WHERE n._exportId IS NOT NULL RETURN count(n)
`);
}
