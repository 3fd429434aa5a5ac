export interface KnowledgeTopic {
    /** Lowercase phrase matched against the query */
    readonly key: string;
    readonly title: string;
    readonly link: string;
    readonly description: string;
}

export const KNOWLEDGE_SOURCE = "Static Knowledge";

export const KNOWLEDGE_TOPICS: readonly KnowledgeTopic[] = Object.freeze([
    {
        key: "mars",
        title: "Mars - The Red Planet",
        link: "https://mars.nasa.gov/",
        description: "Mars is the fourth planet from the Sun and is known as the Red Planet due to iron oxide on its surface. NASA has sent multiple rovers including Perseverance and Curiosity to explore Mars.",
    },
    {
        key: "moon",
        title: "Earth's Moon",
        link: "https://moon.nasa.gov/",
        description: "The Moon is Earth's only natural satellite. NASA's Apollo missions landed humans on the Moon, and the Artemis program aims to return astronauts to the lunar surface.",
    },
    {
        key: "black hole",
        title: "Black Holes",
        link: "https://www.nasa.gov/audience/forstudents/k-4/stories/nasa-knows/what-is-a-black-hole-k4.html",
        description: "Black holes are regions of spacetime where gravity is so strong that nothing can escape. The Event Horizon Telescope captured the first image of a black hole in 2019.",
    },
    {
        key: "spacex",
        title: "SpaceX",
        link: "https://www.spacex.com/",
        description: "SpaceX is a private aerospace company founded by Elon Musk. They develop reusable rockets and spacecraft, including the Falcon 9 rocket and Dragon capsule.",
    },
    {
        key: "iss",
        title: "International Space Station",
        link: "https://www.nasa.gov/mission_pages/station/main/index.html",
        description: "The ISS is a space station in low Earth orbit where astronauts conduct scientific research. It has been continuously occupied since 2000.",
    },
    {
        key: "hubble",
        title: "Hubble Space Telescope",
        link: "https://hubblesite.org/",
        description: "The Hubble Space Telescope has been observing the universe since 1990, providing stunning images and scientific discoveries about distant galaxies, nebulae, and planets.",
    },
    {
        key: "james webb",
        title: "James Webb Space Telescope",
        link: "https://webb.nasa.gov/",
        description: "The James Webb Space Telescope is the most powerful space telescope ever built, designed to observe the universe in infrared light and study the formation of the first galaxies.",
    },
].map(topic => Object.freeze(topic)));

/** Returned when no topic matches */
export const GENERAL_TOPIC: KnowledgeTopic = Object.freeze({
    key: "space exploration",
    title: "Space Exploration",
    link: "https://www.nasa.gov/",
    description: "Space exploration involves the discovery and exploration of celestial structures in outer space by means of continuously evolving space technology. NASA, ESA, and other space agencies lead missions to study planets, moons, asteroids, and distant galaxies.",
});
