import ExternalLinks from "./index";

// Entry injected into every generated page
ExternalLinks.initialize().start();
