export type ExampleId = "flowchart" | "sequence" | "class" | "pie" | "gitgraph";

export type ExampleDiagram = {
  name: string;
  code: string;
};

export const SAMPLE_DIAGRAM = `graph TD
    A[Start] --> B{Have Mermaid source?}
    B -->|Yes| C[Convert to PNG]
    B -->|No| D[Write Mermaid source]
    C --> E[Save image]
    D --> C
    E --> F[Done]

    style A fill:#e1f5fe
    style F fill:#c8e6c9
    style C fill:#fff3e0
`;

export const EXAMPLES: Record<ExampleId, ExampleDiagram> = {
  flowchart: {
    name: "Flowchart",
    code: `graph TD
    A[Start] --> B{Condition}
    B -->|Yes| C[Run task]
    B -->|No| D[Skip task]
    C --> E[End]
    D --> E

    style A fill:#e1f5fe
    style E fill:#c8e6c9
    style C fill:#fff3e0`
  },
  sequence: {
    name: "Sequence diagram",
    code: `sequenceDiagram
    participant User
    participant Service
    participant Store

    User->>Service: Send request
    Service->>Store: Query records
    Store-->>Service: Return rows
    Service-->>User: Respond`
  },
  class: {
    name: "Class diagram",
    code: `classDiagram
    class Shape {
        +String label
        +int sides
        +area()
    }

    class Square {
        +int edge
        +resize()
    }

    class Circle {
        +int radius
        +scale()
    }

    Shape <|-- Square
    Shape <|-- Circle`
  },
  pie: {
    name: "Pie chart",
    code: `pie title Weekly time split
    "Coding" : 40
    "Reviews" : 20
    "Meetings" : 15
    "Docs" : 15
    "Other" : 10`
  },
  gitgraph: {
    name: "Git graph",
    code: `gitGraph
    commit id: "init"
    branch develop
    checkout develop
    commit id: "add parser"
    commit id: "fix edge case"
    checkout main
    merge develop
    commit id: "release 1.0"`
  }
};
