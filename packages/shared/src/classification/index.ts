export { classify, topicForSection, TOPIC_RANGES, TOPIC_PRIORITY, type TopicRange } from './classifier';
