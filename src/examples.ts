/** Sample queries offered by the CLI and the MCP server */
export const EXAMPLE_QUERIES: readonly string[] = [
    "Latest NASA missions to Mars",
    "SpaceX rocket launches this year",
    "International Space Station updates",
    "Hubble telescope discoveries",
    "Solar system exploration",
    "Moon landing missions",
    "Asteroid and comet news",
    "Galaxy and universe studies",
];
